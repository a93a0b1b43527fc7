/**
 * Middleware exports
 */

export { createAuthMiddleware } from './auth.middleware.js';
export { errorHandler, notFoundHandler } from './error.middleware.js';
export { requestLogger } from './request-logger.middleware.js';
