/**
 * Error classes for the Tasklane control plane
 */

export abstract class TasklaneError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

export class ValidationError extends TasklaneError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
}

export class AuthenticationError extends TasklaneError {
  readonly code = 'AUTHENTICATION_ERROR';
  readonly statusCode = 401;
}

export class NotFoundError extends TasklaneError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

export class ConflictError extends TasklaneError {
  readonly code = 'CONFLICT';
  readonly statusCode = 409;
}

export class InternalError extends TasklaneError {
  readonly code = 'INTERNAL_ERROR';
  readonly statusCode = 500;
}

/**
 * Names of the admission rules a job request can violate.
 */
export type BusinessRule =
  | 'prompt'
  | 'banned'
  | 'outputs'
  | 'unknown_model'
  | 'cooldown'
  | 'too_many'
  | 'daily_cap'
  | 'no_credits'
  | 'refs_required';

/**
 * A request was well formed but is not allowed right now. Nothing has been
 * persisted when this is thrown.
 */
export class BusinessRuleError extends TasklaneError {
  readonly code = 'BUSINESS_RULE_VIOLATION';
  readonly statusCode = 422;
  readonly rule: BusinessRule;

  constructor(rule: BusinessRule, message: string, details?: Record<string, unknown>) {
    super(message, { rule, ...details });
    this.rule = rule;
  }
}

export class InsufficientCreditsError extends TasklaneError {
  readonly code = 'INSUFFICIENT_CREDITS';
  readonly statusCode = 402;
  readonly accountId: string;

  constructor(accountId: string, details?: Record<string, unknown>) {
    super(`Insufficient credits for account ${accountId}`, details);
    this.accountId = accountId;
  }
}

/**
 * The job was admitted and charged but the provider throttled dispatch.
 * The job stays pending and is picked up again by the poller.
 */
export class JobDispatchDeferredError extends TasklaneError {
  readonly code = 'JOB_DISPATCH_DEFERRED';
  readonly statusCode = 503;
  readonly jobId: string;

  constructor(jobId: string, details?: Record<string, unknown>) {
    super('Provider is busy, job queued for later dispatch', { jobId, ...details });
    this.jobId = jobId;
  }
}

/**
 * Error raised by a provider adapter. `upstreamStatus` is the HTTP status
 * the provider answered with, or null when no response was received.
 */
export class ProviderError extends TasklaneError {
  readonly code = 'PROVIDER_ERROR';
  readonly statusCode = 502;
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null, details?: Record<string, unknown>) {
    super(message, { upstreamStatus, ...details });
    this.upstreamStatus = upstreamStatus;
  }

  get isRateLimited(): boolean {
    return this.upstreamStatus === 429;
  }

  /** Worth retrying: throttling, upstream 5xx, or no response at all. */
  get transient(): boolean {
    return this.upstreamStatus === null || this.upstreamStatus === 429 || this.upstreamStatus >= 500;
  }
}

export function isTasklaneError(error: unknown): error is TasklaneError {
  return error instanceof TasklaneError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
