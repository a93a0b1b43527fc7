/**
 * Map internal models to API payloads. Stored amounts are millicredits,
 * the API speaks credits.
 */

import { fromMillicredits } from '../../utils/credits.js';
import type { AccountModel } from '../../models/account.model.js';
import type { JobModel } from '../../models/job.model.js';
import type { LedgerEntryModel } from '../../models/ledger.model.js';
import type { TaskModel } from '../../models/task.model.js';
import type { ModelSpec } from '../../services/model-catalog.js';

export interface AccountView {
  readonly accountId: string;
  readonly balance: number;
  readonly banned: boolean;
  readonly isAdmin: boolean;
  readonly adminFreeMode: boolean | null;
  readonly discountPct: number;
  readonly createdAt: string;
}

export interface LedgerEntryView {
  readonly entryId: string;
  readonly delta: number;
  readonly reason: string;
  readonly metadata: Record<string, unknown>;
  readonly createdAt: string;
}

export interface TaskView {
  readonly taskId: string;
  readonly unitIndex: number;
  readonly state: TaskModel['state'];
  readonly providerTaskId: string | null;
  readonly resultUrls: readonly string[];
  readonly failCode: string | null;
  readonly failMsg: string | null;
  readonly attempts: number;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
}

export interface JobView {
  readonly jobId: string;
  readonly accountId: string;
  readonly model: string;
  readonly prompt: string;
  readonly options: Record<string, string>;
  readonly referenceUrls: readonly string[];
  readonly outputsRequested: number;
  readonly status: JobModel['status'];
  readonly cost: {
    readonly subtotal: number;
    readonly discountPct: number;
    readonly total: number;
    readonly charged: number;
    readonly providerCost: number | null;
  };
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface ModelView {
  readonly key: string;
  readonly displayName: string;
  readonly modelType: string;
  readonly references: ModelSpec['references'];
  readonly options: ReadonlyArray<{
    readonly key: string;
    readonly label: string;
    readonly default: string;
    readonly values: ReadonlyArray<{ readonly value: string; readonly label: string }>;
  }>;
}

export function presentAccount(account: AccountModel): AccountView {
  return {
    accountId: account.accountId,
    balance: fromMillicredits(account.balance),
    banned: account.banned,
    isAdmin: account.isAdmin,
    adminFreeMode: account.adminFreeMode,
    discountPct: account.discountPct,
    createdAt: account.createdAt.toISOString(),
  };
}

export function presentLedgerEntry(entry: LedgerEntryModel): LedgerEntryView {
  return {
    entryId: entry.entryId,
    delta: fromMillicredits(entry.delta),
    reason: entry.reason,
    metadata: entry.metadata,
    createdAt: entry.createdAt.toISOString(),
  };
}

export function presentTask(task: TaskModel): TaskView {
  return {
    taskId: task.taskId,
    unitIndex: task.unitIndex,
    state: task.state,
    providerTaskId: task.providerTaskId,
    resultUrls: task.resultUrls,
    failCode: task.failCode,
    failMsg: task.failMsg,
    attempts: task.attempts,
    startedAt: task.startedAt?.toISOString() ?? null,
    finishedAt: task.finishedAt?.toISOString() ?? null,
  };
}

export function presentJob(job: JobModel): JobView {
  return {
    jobId: job.jobId,
    accountId: job.accountId,
    model: job.model,
    prompt: job.prompt,
    options: job.options,
    referenceUrls: job.referenceUrls,
    outputsRequested: job.outputsRequested,
    status: job.status,
    cost: {
      subtotal: fromMillicredits(job.costTotal),
      discountPct: job.discountPct,
      total: fromMillicredits(job.finalCost),
      charged: fromMillicredits(job.chargedAmount),
      providerCost: job.providerCost === null ? null : fromMillicredits(job.providerCost),
    },
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}

export function presentModel(model: ModelSpec): ModelView {
  return {
    key: model.key,
    displayName: model.displayName,
    modelType: model.modelType,
    references: model.references,
    options: model.options.map((option) => ({
      key: option.key,
      label: option.label,
      default: option.default,
      values: option.values.map((value) => ({ value: value.value, label: value.label })),
    })),
  };
}
