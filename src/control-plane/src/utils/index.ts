/**
 * Utility module exports
 */

export { getConfig, resetConfig } from './config.js';
export type { Config } from './config.js';

export { getLogger, createRequestLogger, workLogger, resetLogger } from './logger.js';
export type { WorkContext } from './logger.js';

export {
  MILLIS_PER_CREDIT,
  toMillicredits,
  fromMillicredits,
  formatCredits,
  applyDiscount,
  splitEvenly,
} from './credits.js';

export { Semaphore } from './semaphore.js';

export {
  TasklaneError,
  ValidationError,
  AuthenticationError,
  NotFoundError,
  ConflictError,
  InternalError,
  BusinessRuleError,
  InsufficientCreditsError,
  JobDispatchDeferredError,
  ProviderError,
  isTasklaneError,
  isProviderError,
} from './errors.js';
export type { BusinessRule } from './errors.js';
