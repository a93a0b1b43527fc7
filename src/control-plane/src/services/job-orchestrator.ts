/**
 * Job orchestrator
 *
 * Admits a generation request, charges the ledger and dispatches one
 * provider task per requested output:
 *
 * 1. Admission checks (nothing persisted when one fails)
 * 2. Persist the job as queued
 * 3. Debit the account with key `charge:<jobId>`
 * 4. Create provider tasks and their rows
 * 5. Mark the job running and hand the tasks to the poller
 *
 * A dispatch failure after the charge fails the job and refunds it with
 * key `refund:<jobId>`. Provider throttling leaves the job pending instead;
 * the undispatched units are stored without a provider id and submitted by
 * the poller later.
 */

import { v4 as uuidv4 } from 'uuid';
import type pino from 'pino';
import { getLogger, workLogger } from '../utils/logger.js';
import { formatCredits, toMillicredits } from '../utils/credits.js';
import type { Config } from '../utils/config.js';
import {
  BusinessRuleError,
  InsufficientCreditsError,
  JobDispatchDeferredError,
  NotFoundError,
  isProviderError,
} from '../utils/errors.js';
import {
  CreateJobSchema,
  type CreateJobInput,
  type CreateJobRequest,
  type JobModel,
} from '../models/job.model.js';
import type { TaskModel } from '../models/task.model.js';
import type { AccountModel } from '../models/account.model.js';
import { LedgerReason } from '../types/ledger.js';
import { DISPATCH_ABORTED } from '../types/job.js';
import type { AccountStore, JobStore, LedgerStore, TaskStore } from '../types/stores.js';
import type { ProviderClient } from '../integrations/provider/provider-client.js';
import { buildInput, normalizeOptions, type ModelCatalog, type ModelSpec } from './model-catalog.js';
import type { PricingResolver } from './pricing-resolver.js';
import type { TaskScheduler } from './task-poller.js';

export interface JobOrchestratorOptions {
  readonly maxOutputsPerRequest: number;
  readonly perAccountMaxActiveJobs: number;
  /** Millicredits an account may spend on jobs per trailing 24 hours */
  readonly dailySpendCap: number;
  readonly cooldownMs: number;
  readonly maxPromptLength: number;
  readonly adminFreeModeDefault: boolean;
  readonly refundOnFail: boolean;
}

export interface JobOrchestratorDeps {
  readonly accounts: AccountStore;
  readonly ledger: LedgerStore;
  readonly jobs: JobStore;
  readonly tasks: TaskStore;
  readonly pricing: PricingResolver;
  readonly catalog: ModelCatalog;
  readonly provider: ProviderClient;
  readonly scheduler: TaskScheduler;
  readonly now?: () => Date;
}

export interface JobWithTasks {
  readonly job: JobModel;
  readonly tasks: TaskModel[];
}

export function orchestratorOptionsFromConfig(config: Config): JobOrchestratorOptions {
  const { admission, billing } = config;
  return {
    maxOutputsPerRequest: admission.maxOutputsPerRequest,
    perAccountMaxActiveJobs: admission.perAccountMaxActiveJobs,
    dailySpendCap: toMillicredits(admission.dailySpendCapCredits),
    cooldownMs: admission.cooldownSeconds * 1000,
    maxPromptLength: admission.maxPromptLength,
    adminFreeModeDefault: admission.adminFreeModeDefault,
    refundOnFail: billing.refundOnFail,
  };
}

const COOLDOWN_PRUNE_THRESHOLD = 1000;

interface Admission {
  readonly job: JobModel;
  readonly model: ModelSpec;
  readonly providerInput: Record<string, unknown>;
  readonly freeMode: boolean;
}

export class JobOrchestrator {
  private readonly logger = getLogger().child({ service: 'JobOrchestrator' });
  private readonly deps: JobOrchestratorDeps;
  private readonly options: JobOrchestratorOptions;
  private readonly now: () => Date;
  /** accountId -> epoch ms of the last admitted job */
  private readonly lastAdmittedAt = new Map<string, number>();

  constructor(deps: JobOrchestratorDeps, options: JobOrchestratorOptions) {
    this.deps = deps;
    this.options = options;
    this.now = deps.now ?? (() => new Date());
  }

  async create(input: CreateJobInput): Promise<JobModel> {
    const request = CreateJobSchema.parse(input);
    const now = this.now();

    const prompt = request.prompt.trim();
    if (prompt.length === 0) {
      throw new BusinessRuleError('prompt', 'Prompt must not be empty');
    }
    if (prompt.length > this.options.maxPromptLength) {
      throw new BusinessRuleError('prompt', 'Prompt is too long', {
        maxLength: this.options.maxPromptLength,
        length: prompt.length,
      });
    }

    const account = await this.deps.accounts.get(request.accountId);
    if (account === null) {
      throw new NotFoundError(`Account not found: ${request.accountId}`);
    }
    if (account.banned) {
      throw new BusinessRuleError('banned', 'Account is banned');
    }

    const quantity = request.quantity;
    if (quantity < 1 || quantity > this.options.maxOutputsPerRequest) {
      throw new BusinessRuleError('outputs', `Quantity must be between 1 and ${this.options.maxOutputsPerRequest}`, {
        quantity,
      });
    }

    const releaseCooldown = this.reserveCooldown(account.accountId, now);
    let admission: Admission;
    try {
      admission = await this.admit(request, account, prompt, now);
    } catch (error) {
      releaseCooldown();
      throw error;
    }
    const { job, model, providerInput, freeMode } = admission;

    const log = workLogger(this.logger, job);
    log.info(
      { model: job.model, quantity, cost: job.finalCost, charged: job.chargedAmount, freeMode },
      'Job admitted'
    );

    await this.charge(job, log);
    return this.dispatch(job, model, providerInput, log);
  }

  /**
   * Admission checks that follow the cooldown reservation, ending with the
   * queued job persisted
   */
  private async admit(
    request: CreateJobRequest,
    account: AccountModel,
    prompt: string,
    now: Date
  ): Promise<Admission> {
    const { ledger, jobs, pricing, catalog } = this.deps;
    const quantity = request.quantity;

    const model = catalog.get(request.model);
    if (model === null) {
      throw new BusinessRuleError('unknown_model', `Unknown model: ${request.model}`);
    }

    const active = await jobs.countActive(account.accountId);
    if (active >= this.options.perAccountMaxActiveJobs) {
      throw new BusinessRuleError('too_many', 'Too many jobs in progress', {
        active,
        limit: this.options.perAccountMaxActiveJobs,
      });
    }

    const referenceUrls = request.referenceUrls;
    const options = normalizeOptions(model, request.options, referenceUrls.length);
    const { price, providerCost } = await pricing.quote(model, options, quantity, account.discountPct);
    const freeMode = this.isFreeMode(account);

    if (!account.isAdmin) {
      const spent = await ledger.getDailySpent(account.accountId, now);
      if (spent + price.total > this.options.dailySpendCap) {
        throw new BusinessRuleError('daily_cap', 'Daily spend limit reached', {
          spent: formatCredits(spent),
          cost: formatCredits(price.total),
          cap: formatCredits(this.options.dailySpendCap),
        });
      }
    }

    if (!freeMode && account.balance < price.total) {
      throw new BusinessRuleError('no_credits', 'Not enough credits', {
        balance: formatCredits(account.balance),
        cost: formatCredits(price.total),
      });
    }

    if (model.references.mode === 'required' && referenceUrls.length === 0) {
      throw new BusinessRuleError('refs_required', `Model ${model.key} requires reference images`);
    }

    const providerInput = buildInput(model, prompt, options, referenceUrls);

    const job: JobModel = {
      jobId: uuidv4(),
      accountId: account.accountId,
      model: model.key,
      prompt,
      options,
      referenceUrls,
      outputsRequested: quantity,
      costTotal: price.subtotal,
      discountPct: price.discountPct,
      finalCost: price.total,
      chargedAmount: freeMode ? 0 : price.total,
      providerCost,
      status: 'queued',
      refundPending: false,
      createdAt: now,
      updatedAt: now,
    };

    await jobs.create(job);
    return { job, model, providerInput, freeMode };
  }

  async getJob(jobId: string): Promise<JobWithTasks> {
    const job = await this.deps.jobs.get(jobId);
    if (job === null) {
      throw new NotFoundError(`Job not found: ${jobId}`);
    }
    const tasks = await this.deps.tasks.listByJob(jobId);
    return { job, tasks };
  }

  async listJobs(accountId: string, limit: number): Promise<JobModel[]> {
    return this.deps.jobs.listByAccount(accountId, limit);
  }

  private isFreeMode(account: AccountModel): boolean {
    return account.isAdmin && (account.adminFreeMode ?? this.options.adminFreeModeDefault);
  }

  /**
   * Claim the account's cooldown slot before any await, so concurrent
   * requests cannot both pass. Returns a function that gives the slot back
   * when admission fails later.
   */
  private reserveCooldown(accountId: string, now: Date): () => void {
    const { cooldownMs } = this.options;
    if (cooldownMs <= 0) {
      return () => undefined;
    }

    if (this.lastAdmittedAt.size > COOLDOWN_PRUNE_THRESHOLD) {
      for (const [id, at] of this.lastAdmittedAt) {
        if (now.getTime() - at >= cooldownMs) {
          this.lastAdmittedAt.delete(id);
        }
      }
    }

    const last = this.lastAdmittedAt.get(accountId);
    if (last !== undefined && now.getTime() - last < cooldownMs) {
      throw new BusinessRuleError('cooldown', 'Please wait before starting another job', {
        retryAfterMs: cooldownMs - (now.getTime() - last),
      });
    }

    const reservedAt = now.getTime();
    this.lastAdmittedAt.set(accountId, reservedAt);
    return () => {
      if (this.lastAdmittedAt.get(accountId) !== reservedAt) {
        return;
      }
      if (last === undefined) {
        this.lastAdmittedAt.delete(accountId);
      } else {
        this.lastAdmittedAt.set(accountId, last);
      }
    };
  }

  private async charge(job: JobModel, log: pino.Logger): Promise<void> {
    if (job.chargedAmount <= 0) {
      return;
    }

    try {
      await this.deps.ledger.post({
        accountId: job.accountId,
        delta: -job.chargedAmount,
        reason: LedgerReason.JOB_CHARGE,
        metadata: { jobId: job.jobId, model: job.model, quantity: job.outputsRequested },
        idempotencyKey: `charge:${job.jobId}`,
        guardBalance: true,
      });
    } catch (error) {
      await this.deps.jobs.updateStatus(job.jobId, 'fail');
      if (error instanceof InsufficientCreditsError) {
        log.warn('Balance changed during admission, job failed');
        throw new BusinessRuleError('no_credits', 'Not enough credits', { jobId: job.jobId });
      }
      throw error;
    }
  }

  private async dispatch(
    job: JobModel,
    model: ModelSpec,
    providerInput: Record<string, unknown>,
    log: pino.Logger
  ): Promise<JobModel> {
    const { provider, tasks, jobs, scheduler } = this.deps;
    const created: TaskModel[] = [];
    let deferredFrom: number | null = null;

    try {
      for (let unitIndex = 0; unitIndex < job.outputsRequested; unitIndex++) {
        let providerTaskId: string;
        try {
          providerTaskId = await provider.createTask(model.providerModel, providerInput);
        } catch (error) {
          if (isProviderError(error) && error.isRateLimited) {
            deferredFrom = unitIndex;
            break;
          }
          throw error;
        }
        created.push(await tasks.create(this.newTask(job, unitIndex, model, providerInput, providerTaskId)));
      }

      if (deferredFrom !== null) {
        for (let unitIndex = deferredFrom; unitIndex < job.outputsRequested; unitIndex++) {
          created.push(await tasks.create(this.newTask(job, unitIndex, model, providerInput, null)));
        }
      }
    } catch (error) {
      await this.abortDispatch(job, created, error, log);
      throw error;
    }

    if (deferredFrom !== null) {
      await jobs.updateStatus(job.jobId, 'pending');
      for (const task of created) {
        scheduler.schedule(task.taskId);
      }
      log.warn({ dispatched: deferredFrom, deferred: job.outputsRequested - deferredFrom }, 'Provider throttled dispatch');
      throw new JobDispatchDeferredError(job.jobId, {
        dispatched: deferredFrom,
        deferred: job.outputsRequested - deferredFrom,
      });
    }

    const running = await jobs.updateStatus(job.jobId, 'running');
    for (const task of created) {
      scheduler.schedule(task.taskId);
    }
    log.info({ tasks: created.length }, 'Job dispatched');
    return running;
  }

  /**
   * Undo a partially dispatched job. Failures here are logged so the
   * original dispatch error still reaches the caller; the job keeps its
   * refund flag until the refund lands, and poller recovery settles it.
   */
  private async abortDispatch(
    job: JobModel,
    created: readonly TaskModel[],
    cause: unknown,
    log: pino.Logger
  ): Promise<void> {
    const message = cause instanceof Error ? cause.message : String(cause);
    const owesRefund = job.chargedAmount > 0 && this.options.refundOnFail;
    log.error({ error: cause, created: created.length }, 'Dispatch failed, rolling back job');

    try {
      if (owesRefund) {
        await this.deps.jobs.markRefundPending(job.jobId);
      }
      await this.deps.jobs.updateStatus(job.jobId, 'fail');
      const now = this.now();
      for (const task of created) {
        await this.deps.tasks.abort(task.taskId, { code: DISPATCH_ABORTED, message }, now);
      }

      if (owesRefund) {
        await this.deps.ledger.post({
          accountId: job.accountId,
          delta: job.chargedAmount,
          reason: LedgerReason.JOB_REFUND,
          metadata: { jobId: job.jobId, cause: 'dispatch_failed' },
          idempotencyKey: `refund:${job.jobId}`,
        });
        await this.deps.jobs.clearRefundPending(job.jobId);
        log.info({ amount: job.chargedAmount }, 'Dispatch charge refunded');
      }
    } catch (rollbackError) {
      log.error({ error: rollbackError }, 'Rollback after dispatch failure did not complete');
    }
  }

  private newTask(
    job: JobModel,
    unitIndex: number,
    model: ModelSpec,
    input: Record<string, unknown>,
    providerTaskId: string | null
  ): TaskModel {
    return {
      taskId: uuidv4(),
      jobId: job.jobId,
      accountId: job.accountId,
      unitIndex,
      providerModel: model.providerModel,
      input,
      providerTaskId,
      state: 'queued',
      resultUrls: [],
      failCode: null,
      failMsg: null,
      attempts: 0,
      createdAt: this.now(),
      startedAt: null,
      finishedAt: null,
      rawResponse: null,
    };
  }
}
