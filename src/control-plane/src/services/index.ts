/**
 * Service layer exports
 */

export {
  ModelCatalog,
  getModelCatalog,
  resetModelCatalog,
  normalizeOptions,
  findOptionValue,
  buildInput,
  type ModelSpec,
  type OptionSpec,
  type OptionValue,
  type BundleRule,
} from './model-catalog.js';
export {
  PricingResolver,
  resolvePrice,
  resolveBundleKey,
  type PriceMap,
  type PriceModifier,
  type PriceBreakdown,
  type Quote,
} from './pricing-resolver.js';
export {
  TaskPoller,
  pollerOptionsFromConfig,
  refundsDue,
  rollUpStatus,
  abortableSleep,
  type TaskScheduler,
  type TaskPollerOptions,
  type TaskPollerDeps,
  type TaskPollerStatus,
  type SleepFn,
} from './task-poller.js';
export {
  JobOrchestrator,
  orchestratorOptionsFromConfig,
  type JobOrchestratorOptions,
  type JobOrchestratorDeps,
  type JobWithTasks,
} from './job-orchestrator.js';
export { AccountService, type AccountServiceOptions, type ProvisionResult } from './account-service.js';
