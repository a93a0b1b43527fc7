import type { Request, Response } from 'express';
import type { ApiResponse } from '../../types/api.js';

export function sendData<T>(req: Request, res: Response, statusCode: number, data: T): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      requestId: req.requestId ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  res.status(statusCode).json(response);
}

export function requireParam(req: Request, name: string): string {
  const value = req.params[name];
  if (value === undefined || value === '') {
    throw new Error(`Route parameter missing: ${name}`);
  }
  return value;
}
