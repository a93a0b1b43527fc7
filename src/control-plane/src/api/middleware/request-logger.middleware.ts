/**
 * Request logging middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createRequestLogger } from '../../utils/logger.js';
import '../../types/api.js';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function resolveRequestId(req: Request): string {
  // Keep an upstream id so logs line up across hops
  const incoming = req.headers['x-request-id'];
  return typeof incoming === 'string' && REQUEST_ID_PATTERN.test(incoming) ? incoming : uuidv4();
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req);
  const startTime = Date.now();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  const reqLogger = createRequestLogger(requestId);
  reqLogger.debug({ method: req.method, url: req.originalUrl }, 'Incoming request');

  res.on('finish', () => {
    const logData = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
    };

    if (res.statusCode >= 500) {
      reqLogger.error(logData, 'Request completed with server error');
    } else if (res.statusCode >= 400) {
      reqLogger.warn(logData, 'Request completed with client error');
    } else if (req.originalUrl.startsWith('/health')) {
      // Probes hit every few seconds
      reqLogger.debug(logData, 'Health probe');
    } else {
      reqLogger.info(logData, 'Request completed');
    }
  });

  next();
}
