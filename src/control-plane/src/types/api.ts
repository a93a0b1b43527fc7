/**
 * API type definitions for HTTP request/response handling
 */

declare global {
  namespace Express {
    interface Request {
      /** Set by the request logger middleware */
      requestId?: string;
    }
  }
}

export interface ApiResponse<T> {
  readonly success: boolean;
  readonly data?: T | undefined;
  readonly error?: ApiError | undefined;
  readonly meta?: ResponseMeta | undefined;
}

export interface ApiError {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown> | undefined;
}

export interface ResponseMeta {
  readonly requestId: string;
  readonly timestamp: string;
}

export interface HealthCheckResponse {
  readonly status: 'healthy' | 'degraded' | 'unhealthy';
  readonly version: string;
  readonly uptime: number;
  readonly checks: Record<string, HealthCheck>;
}

export interface HealthCheck {
  readonly status: 'pass' | 'warn' | 'fail';
  readonly message?: string | undefined;
  readonly details?: Record<string, unknown> | undefined;
}
