/**
 * Persistence seams used by the services.
 *
 * The DynamoDB repositories implement these; tests substitute in-memory
 * versions.
 */

import type { AccountModel, CreateAccountInput, UpdateAccountInput } from '../models/account.model.js';
import type { LedgerEntryModel } from '../models/ledger.model.js';
import type { PriceModel } from '../models/price.model.js';
import type { JobModel } from '../models/job.model.js';
import type { TaskModel } from '../models/task.model.js';
import type { JobStatus, FailInfo } from './job.js';
import type { PostLedgerEntryInput } from './ledger.js';

export interface AccountStore {
  get(accountId: string): Promise<AccountModel | null>;
  /** Creates the account with a zero balance unless it already exists */
  create(input: CreateAccountInput): Promise<{ account: AccountModel; created: boolean }>;
  update(accountId: string, patch: UpdateAccountInput): Promise<AccountModel>;
}

export interface PostLedgerResult {
  readonly entry: LedgerEntryModel;
  /** false when the idempotency key had already been applied */
  readonly applied: boolean;
}

export interface LedgerStore {
  /**
   * Append an entry and move the cached balance by `delta` atomically. A
   * repeated idempotency key returns the original entry and changes nothing.
   */
  post(input: PostLedgerEntryInput): Promise<PostLedgerResult>;
  getBalance(accountId: string): Promise<number>;
  /** Sum of job charges over the trailing 24 hours, millicredits */
  getDailySpent(accountId: string, now?: Date): Promise<number>;
  listEntries(accountId: string, limit: number): Promise<LedgerEntryModel[]>;
}

export interface PriceStore {
  /** Active prices of one model */
  listForModel(modelKey: string): Promise<PriceModel[]>;
}

export interface JobStore {
  create(job: JobModel): Promise<JobModel>;
  get(jobId: string): Promise<JobModel | null>;
  updateStatus(jobId: string, status: JobStatus): Promise<JobModel>;
  /** Move the status only while it is still `from`; null when it has moved on */
  transitionStatus(jobId: string, from: JobStatus, to: JobStatus): Promise<JobModel | null>;
  markRefundPending(jobId: string): Promise<void>;
  clearRefundPending(jobId: string): Promise<void>;
  /** Jobs whose refunds may not have been posted */
  listRefundPending(): Promise<JobModel[]>;
  countActive(accountId: string): Promise<number>;
  listByAccount(accountId: string, limit: number): Promise<JobModel[]>;
}

export interface MarkSuccessInput {
  readonly resultUrls: readonly string[];
  readonly rawResponse: Record<string, unknown>;
}

export interface MarkFailInput extends FailInfo {
  readonly rawResponse?: Record<string, unknown>;
}

export interface TaskStore {
  create(task: TaskModel): Promise<TaskModel>;
  get(taskId: string): Promise<TaskModel | null>;
  listByJob(jobId: string): Promise<TaskModel[]>;
  /**
   * Atomically move a task to `running` when it is queued, pending, or
   * running with a start time older than `staleBefore`. Returns whether
   * this caller won the claim.
   */
  claim(taskId: string, now: Date, staleBefore: Date): Promise<boolean>;
  setProviderTaskId(taskId: string, providerTaskId: string): Promise<void>;
  /** The following only apply while the task is `running` */
  markSuccess(taskId: string, input: MarkSuccessInput, now: Date): Promise<boolean>;
  markFail(taskId: string, input: MarkFailInput, now: Date): Promise<boolean>;
  markPending(taskId: string): Promise<boolean>;
  /** Fail a task that was never scheduled (state `queued`) */
  abort(taskId: string, info: FailInfo, now: Date): Promise<boolean>;
  /** Tasks to reschedule after a restart */
  listRecoverable(staleBefore: Date): Promise<TaskModel[]>;
}
