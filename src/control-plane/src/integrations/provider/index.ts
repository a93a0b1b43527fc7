export {
  normalizeProviderStatus,
  SUCCESS_STATUSES,
  FAIL_STATUSES,
  RUNNING_STATUSES,
  type ProviderClient,
  type ProviderStatusRecord,
} from './provider-client.js';
export { KieProviderClient, type KieProviderOptions } from './kie-provider.js';
