/**
 * Handler exports
 */

export { AccountHandler } from './account.handler.js';
export { HealthHandler, type HealthProbes } from './health.handler.js';
export { JobHandler } from './job.handler.js';
export { ModelHandler } from './model.handler.js';
export * from './presenters.js';
