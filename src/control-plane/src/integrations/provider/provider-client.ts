/**
 * Compute provider seam
 *
 * The orchestrator and the poller only talk to the provider through this
 * interface; adapters are chosen when the process is wired together.
 */

import type { FailInfo, ProviderTaskStatus } from '../../types/job.js';

/** Raw status payload as returned by the provider */
export type ProviderStatusRecord = Record<string, unknown>;

export interface ProviderClient {
  readonly name: string;
  /**
   * Submit one unit of work. Resolves to the provider's task id; rejects
   * with a ProviderError carrying the upstream HTTP status.
   */
  createTask(providerModel: string, input: Record<string, unknown>): Promise<string>;
  getTask(providerTaskId: string): Promise<ProviderStatusRecord>;
  extractStatus(record: ProviderStatusRecord): ProviderTaskStatus;
  extractResultUrls(record: ProviderStatusRecord): string[];
  extractFailInfo(record: ProviderStatusRecord): FailInfo;
}

export const SUCCESS_STATUSES: ReadonlySet<string> = new Set(['success', 'succeeded', 'completed', 'done']);
export const FAIL_STATUSES: ReadonlySet<string> = new Set(['fail', 'failed', 'error']);
export const RUNNING_STATUSES: ReadonlySet<string> = new Set(['running', 'generating', 'processing']);

/**
 * Map a provider status string onto the task lifecycle. Anything not known
 * to be terminal or running is treated as still waiting.
 */
export function normalizeProviderStatus(raw: string): ProviderTaskStatus {
  const status = raw.trim().toLowerCase();
  if (SUCCESS_STATUSES.has(status)) {
    return 'success';
  }
  if (FAIL_STATUSES.has(status)) {
    return 'fail';
  }
  if (RUNNING_STATUSES.has(status)) {
    return 'running';
  }
  return 'pending';
}
