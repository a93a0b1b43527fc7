/**
 * Bearer token authentication for the operator API
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getLogger } from '../../utils/logger.js';
import { AuthenticationError } from '../../utils/errors.js';

const logger = getLogger().child({ middleware: 'auth' });

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function extractToken(req: Request): string | null {
  const authHeader = req.headers['authorization'];
  if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
    return authHeader.slice(7).trim();
  }
  return null;
}

/**
 * Without a configured token every request is let through. Config refuses
 * to start without one in production.
 */
export function createAuthMiddleware(apiToken: string | undefined): RequestHandler {
  if (apiToken === undefined || apiToken === '') {
    logger.warn('API_TOKEN is not set, operator API is unauthenticated');
    return (_req: Request, _res: Response, next: NextFunction): void => {
      next();
    };
  }

  const expected = digest(apiToken);

  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = extractToken(req);
    if (token === null) {
      next(new AuthenticationError('Bearer token required'));
      return;
    }

    if (!timingSafeEqual(digest(token), expected)) {
      logger.warn({ requestId: req.requestId }, 'Rejected invalid bearer token');
      next(new AuthenticationError('Invalid bearer token'));
      return;
    }

    next();
  };
}
