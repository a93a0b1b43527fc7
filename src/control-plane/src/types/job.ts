/**
 * Job and task lifecycle types
 */

/**
 * Aggregate status of a job. `queued` until dispatch finishes, then
 * derived from the states of its tasks.
 */
export type JobStatus = 'queued' | 'running' | 'pending' | 'success' | 'fail' | 'partial';

export const JOB_STATUSES: readonly JobStatus[] = [
  'queued',
  'running',
  'pending',
  'success',
  'fail',
  'partial',
] as const;

/** Jobs in these states count towards the per-account active job limit. */
export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = ['queued', 'running', 'pending'] as const;

export type TaskState = 'queued' | 'pending' | 'running' | 'success' | 'fail';

export const TASK_STATES: readonly TaskState[] = ['queued', 'pending', 'running', 'success', 'fail'] as const;

export const TERMINAL_TASK_STATES: readonly TaskState[] = ['success', 'fail'] as const;

export function isTerminalTaskState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.includes(state);
}

/**
 * Normalised outcome of a provider status record.
 */
export type ProviderTaskStatus = 'success' | 'fail' | 'pending' | 'running';

/** Fail code of tasks rolled back when their job could not be dispatched */
export const DISPATCH_ABORTED = 'dispatch_aborted';

export interface FailInfo {
  readonly code: string;
  readonly message: string;
}
