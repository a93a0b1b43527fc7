/**
 * Error handling middleware
 *
 * Every failure leaves as the standard envelope. Tasklane errors keep their
 * own status and code; admission failures therefore answer 422 with the
 * violated rule in `details.rule`.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '../../utils/logger.js';
import { isTasklaneError } from '../../utils/errors.js';
import type { ApiError, ApiResponse } from '../../types/api.js';

const logger = getLogger().child({ middleware: 'error' });

function sendError(req: Request, res: Response, statusCode: number, error: ApiError): void {
  const response: ApiResponse<never> = {
    success: false,
    error,
    meta: {
      requestId: req.requestId ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };

  res.status(statusCode).json(response);
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = req.requestId ?? 'unknown';

  if (error instanceof ZodError) {
    const errors = error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }));
    logger.warn({ requestId, errors }, 'Validation error');
    sendError(req, res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { errors },
    });
    return;
  }

  // Malformed JSON from the body parser
  if (error instanceof SyntaxError && 'body' in error) {
    logger.warn({ requestId, message: error.message }, 'Malformed request body');
    sendError(req, res, 400, { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' });
    return;
  }

  if (isTasklaneError(error)) {
    const context = { requestId, code: error.code, message: error.message, details: error.details };
    if (error.statusCode >= 500) {
      logger.error(context, 'Request failed');
    } else {
      logger.warn(context, 'Request failed');
    }
    sendError(req, res, error.statusCode, error.toJSON());
    return;
  }

  logger.error({ requestId, error }, 'Unhandled error');
  sendError(req, res, 500, { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
}

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(req, res, 404, { code: 'NOT_FOUND', message: `Route not found: ${req.method} ${req.path}` });
}
