/**
 * Task poller
 *
 * Drives every outstanding provider task to a terminal state:
 *
 *   queued/pending --claim--> running --provider result--> success | fail
 *   running --max wait exceeded--> pending (re-scheduled later)
 *
 * Each task runs as one async unit of work gated by a global semaphore and
 * a per-account semaphore (always acquired in that order). The claim is a
 * conditional write, so scheduling the same task twice, or from two
 * processes, polls it once. After every terminal transition the parent job
 * status is recomputed from its tasks and failures are refunded. A job is
 * flagged before a failure that may owe a refund and unflagged once the
 * refunds are posted, so recovery can settle anything a crash left behind.
 */

import type pino from 'pino';
import { getLogger, workLogger } from '../utils/logger.js';
import { ConflictError, isProviderError } from '../utils/errors.js';
import { splitEvenly } from '../utils/credits.js';
import { Semaphore } from '../utils/semaphore.js';
import type { Config } from '../utils/config.js';
import type { JobModel } from '../models/job.model.js';
import type { TaskModel } from '../models/task.model.js';
import {
  DISPATCH_ABORTED,
  isTerminalTaskState,
  type FailInfo,
  type JobStatus,
  type TaskState,
} from '../types/job.js';
import { LedgerReason } from '../types/ledger.js';
import type { JobStore, LedgerStore, TaskStore } from '../types/stores.js';
import type { ProviderClient, ProviderStatusRecord } from '../integrations/provider/provider-client.js';
import type {
  NotificationChannel,
  NotificationContext,
} from '../integrations/notifications/notification-channel.js';

/**
 * Handle the orchestrator uses to hand tasks over for polling
 */
export interface TaskScheduler {
  schedule(taskId: string): void;
}

export interface TaskPollerOptions {
  /** Delay before each poll; the last value repeats */
  readonly backoffMs: readonly number[];
  /** Total time slept before a task is parked as pending */
  readonly maxWaitMs: number;
  /** A running task older than this is considered abandoned */
  readonly staleAfterMs: number;
  readonly rescheduleDelayMs: number;
  /** Upper bound of one provider request, counted against the stale lease */
  readonly requestTimeoutMs: number;
  readonly globalConcurrency: number;
  readonly perAccountConcurrency: number;
  readonly refundOnFail: boolean;
  /** Refund each failed unit's share instead of refunding only fully failed jobs */
  readonly partialRefunds: boolean;
}

/** Resolves false when aborted before the delay elapsed */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<boolean>;

export interface TaskPollerDeps {
  readonly tasks: TaskStore;
  readonly jobs: JobStore;
  readonly ledger: LedgerStore;
  readonly provider: ProviderClient;
  readonly notifications: NotificationChannel;
  readonly sleep?: SleepFn;
  readonly now?: () => Date;
}

export interface TaskPollerStatus {
  readonly inFlight: number;
  readonly delayed: number;
  readonly accountsActive: number;
  readonly stopping: boolean;
}

export function pollerOptionsFromConfig(config: Config): TaskPollerOptions {
  const { poller, billing, provider } = config;
  return {
    backoffMs: poller.backoffSeconds.map((seconds) => seconds * 1000),
    maxWaitMs: poller.maxWaitSeconds * 1000,
    staleAfterMs: poller.staleRunningSeconds * 1000,
    rescheduleDelayMs: poller.rescheduleDelaySeconds * 1000,
    requestTimeoutMs: provider.requestTimeoutSeconds * 1000,
    globalConcurrency: poller.globalConcurrency,
    perAccountConcurrency: poller.perAccountConcurrency,
    refundOnFail: billing.refundOnFail,
    partialRefunds: billing.partialRefunds,
  };
}

/**
 * Job status implied by the states of its tasks
 */
export function rollUpStatus(states: readonly TaskState[]): JobStatus {
  if (states.length === 0 || !states.every(isTerminalTaskState)) {
    return 'running';
  }
  if (states.every((state) => state === 'success')) {
    return 'success';
  }
  if (states.every((state) => state === 'fail')) {
    return 'fail';
  }
  return 'partial';
}

function isTerminalJobStatus(status: JobStatus): boolean {
  return status === 'success' || status === 'fail' || status === 'partial';
}

const ROLL_UP_ATTEMPTS = 5;

export interface RefundDue {
  readonly amount: number;
  readonly idempotencyKey: string;
  /** Set for per-unit refunds */
  readonly taskId: string | null;
  readonly unitIndex: number | null;
}

/**
 * Refunds a job is owed given the current states of its tasks. A job rolled
 * back at dispatch is always refunded in full under `refund:<jobId>`.
 */
export function refundsDue(
  job: JobModel,
  tasks: readonly TaskModel[],
  policy: Pick<TaskPollerOptions, 'refundOnFail' | 'partialRefunds'>
): RefundDue[] {
  if (!policy.refundOnFail || job.chargedAmount <= 0) {
    return [];
  }

  const abortedAtDispatch = tasks.length === 0 || tasks.some((task) => task.failCode === DISPATCH_ABORTED);
  if (!policy.partialRefunds || abortedAtDispatch) {
    return job.status === 'fail'
      ? [{ amount: job.chargedAmount, idempotencyKey: `refund:${job.jobId}`, taskId: null, unitIndex: null }]
      : [];
  }

  const shares = splitEvenly(job.chargedAmount, job.outputsRequested);
  return tasks
    .filter((task) => task.state === 'fail')
    .map((task) => ({
      amount: shares[task.unitIndex] ?? 0,
      idempotencyKey: `refund:${job.jobId}:unit:${task.unitIndex}`,
      taskId: task.taskId,
      unitIndex: task.unitIndex,
    }))
    .filter((refund) => refund.amount > 0);
}

export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

interface AccountSlot {
  readonly semaphore: Semaphore;
  users: number;
}

export class TaskPoller implements TaskScheduler {
  private readonly logger = getLogger().child({ service: 'TaskPoller' });
  private readonly tasks: TaskStore;
  private readonly jobs: JobStore;
  private readonly ledger: LedgerStore;
  private readonly provider: ProviderClient;
  private readonly notifications: NotificationChannel;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  private readonly globalSlots: Semaphore;
  private readonly accountSlots = new Map<string, AccountSlot>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly abortController = new AbortController();
  private stopping = false;

  constructor(
    deps: TaskPollerDeps,
    private readonly options: TaskPollerOptions
  ) {
    if (options.backoffMs.length === 0) {
      throw new RangeError('Poll backoff sequence must not be empty');
    }
    this.tasks = deps.tasks;
    this.jobs = deps.jobs;
    this.ledger = deps.ledger;
    this.provider = deps.provider;
    this.notifications = deps.notifications;
    this.sleep = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? (() => new Date());
    this.globalSlots = new Semaphore(options.globalConcurrency);
  }

  /**
   * Start polling a task in the background. Safe to call any number of
   * times for the same task.
   */
  schedule(taskId: string): void {
    if (this.stopping) {
      this.logger.debug({ taskId }, 'Poller stopping, schedule ignored');
      return;
    }

    this.track(
      this.runTask(taskId).catch((error: unknown) => {
        this.logger.error({ taskId, error }, 'Task polling failed');
      })
    );
  }

  scheduleAfter(taskId: string, delayMs: number): void {
    this.after(delayMs, () => this.schedule(taskId));
  }

  /**
   * Re-schedule everything left unfinished by a previous process and settle
   * the refunds of jobs still flagged as owing one. Returns the number of
   * tasks re-scheduled.
   */
  async recover(): Promise<number> {
    const staleBefore = new Date(this.now().getTime() - this.options.staleAfterMs);
    const [recoverable, unsettled] = await Promise.all([
      this.tasks.listRecoverable(staleBefore),
      this.jobs.listRefundPending(),
    ]);

    for (const task of recoverable) {
      this.schedule(task.taskId);
    }
    for (const job of unsettled) {
      this.scheduleSettlement(job.jobId);
    }

    this.logger.info({ count: recoverable.length, refundsPending: unsettled.length }, 'Recovered outstanding tasks');
    return recoverable.length;
  }

  /**
   * Settle a job's refunds in the background, retrying after the reschedule
   * delay when a ledger write fails.
   */
  scheduleSettlement(jobId: string): void {
    if (this.stopping) {
      return;
    }

    this.track(
      this.settleRefunds(jobId).then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ jobId, error, retryInMs: this.options.rescheduleDelayMs }, 'Refund settlement failed');
          this.after(this.options.rescheduleDelayMs, () => this.scheduleSettlement(jobId));
        }
      )
    );
  }

  /**
   * Post every refund the job's current task states call for. Entries posted
   * earlier are skipped by their idempotency keys. The refund flag is cleared
   * once every task is terminal, since no later failure can add to the set.
   */
  async settleRefunds(jobId: string): Promise<RefundDue[]> {
    const job = await this.rollUp(jobId);
    if (job === null) {
      return [];
    }

    const tasks = await this.tasks.listByJob(jobId);
    const due = refundsDue(job, tasks, this.options);
    const log = workLogger(this.logger, job);

    for (const refund of due) {
      const { applied } = await this.ledger.post({
        accountId: job.accountId,
        delta: refund.amount,
        reason: LedgerReason.JOB_REFUND,
        metadata: {
          jobId: job.jobId,
          ...(refund.taskId !== null ? { taskId: refund.taskId, unitIndex: refund.unitIndex } : {}),
        },
        idempotencyKey: refund.idempotencyKey,
      });
      if (applied) {
        log.info({ amount: refund.amount, idempotencyKey: refund.idempotencyKey }, 'Refund posted');
      }
    }

    if (tasks.every((task) => isTerminalTaskState(task.state))) {
      await this.jobs.clearRefundPending(jobId);
    }
    return due;
  }

  /**
   * Wait until no unit of work is running. Delayed re-schedules that have
   * not fired yet are not waited for.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /**
   * Stop taking work, wake sleeping loops and wait for them to exit. Tasks
   * interrupted mid-poll stay `running` and are picked up as stale by the
   * next recovery.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.abortController.abort();
    await this.drain();
    this.logger.info('Task poller stopped');
  }

  status(): TaskPollerStatus {
    return {
      inFlight: this.inFlight.size,
      delayed: this.timers.size,
      accountsActive: this.accountSlots.size,
      stopping: this.stopping,
    };
  }

  /**
   * Recompute and persist the job status from its tasks. The write only
   * lands if the status read is still current; otherwise the status is
   * derived again. A job that already reached a terminal status is never
   * moved back to running.
   */
  async rollUp(jobId: string): Promise<JobModel | null> {
    for (let attempt = 0; attempt < ROLL_UP_ATTEMPTS; attempt++) {
      const [job, tasks] = await Promise.all([this.jobs.get(jobId), this.tasks.listByJob(jobId)]);
      if (job === null || tasks.length === 0) {
        return job;
      }

      const status = rollUpStatus(tasks.map((task) => task.state));
      if (status === job.status || (!isTerminalJobStatus(status) && isTerminalJobStatus(job.status))) {
        return job;
      }

      const updated = await this.jobs.transitionStatus(jobId, job.status, status);
      if (updated !== null) {
        this.logger.info({ jobId, from: job.status, to: status }, 'Job status rolled up');
        return updated;
      }
      this.logger.debug({ jobId, expected: job.status }, 'Job status changed during roll-up');
    }

    throw new ConflictError(`Job ${jobId} status kept changing during roll-up`, { jobId });
  }

  private track(work: Promise<void>): void {
    const run: Promise<void> = work.finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
  }

  private after(delayMs: number, fn: () => void): void {
    if (this.stopping) {
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, delayMs);
    timer.unref();
    this.timers.add(timer);
  }

  private async runTask(taskId: string): Promise<void> {
    const task = await this.tasks.get(taskId);
    if (task === null) {
      this.logger.warn({ taskId }, 'Scheduled task does not exist');
      return;
    }
    if (isTerminalTaskState(task.state)) {
      return;
    }

    await this.globalSlots.use(() => this.withAccountSlot(task.accountId, () => this.claimAndPoll(task)));
  }

  private async withAccountSlot<T>(accountId: string, fn: () => Promise<T>): Promise<T> {
    let slot = this.accountSlots.get(accountId);
    if (slot === undefined) {
      slot = { semaphore: new Semaphore(this.options.perAccountConcurrency), users: 0 };
      this.accountSlots.set(accountId, slot);
    }

    slot.users += 1;
    try {
      return await slot.semaphore.use(fn);
    } finally {
      slot.users -= 1;
      if (slot.users === 0) {
        this.accountSlots.delete(accountId);
      }
    }
  }

  private async claimAndPoll(scheduled: TaskModel): Promise<void> {
    if (this.stopping) {
      return;
    }

    const now = this.now();
    const staleBefore = new Date(now.getTime() - this.options.staleAfterMs);
    const claimed = await this.tasks.claim(scheduled.taskId, now, staleBefore);
    if (!claimed) {
      this.logger.debug({ taskId: scheduled.taskId }, 'Task already claimed or finished');
      return;
    }

    const task = (await this.tasks.get(scheduled.taskId)) ?? scheduled;
    const log = workLogger(this.logger, task);

    let providerTaskId = task.providerTaskId;
    if (providerTaskId === null) {
      providerTaskId = await this.dispatch(task, log);
      if (providerTaskId === null) {
        return;
      }
    }

    await this.pollUntilSettled(task, providerTaskId, now.getTime(), log);
  }

  /**
   * Submit a task whose dispatch was deferred by provider throttling
   */
  private async dispatch(task: TaskModel, log: pino.Logger): Promise<string | null> {
    let providerTaskId: string;
    try {
      providerTaskId = await this.provider.createTask(task.providerModel, task.input);
    } catch (error) {
      if (isProviderError(error) && error.transient) {
        log.debug({ error }, 'Deferred dispatch still throttled');
        await this.park(task, log);
        return null;
      }
      await this.failTask(task, { code: 'provider_error', message: this.describe(error) }, log);
      return null;
    }

    await this.tasks.setProviderTaskId(task.taskId, providerTaskId);
    log.info({ providerTaskId }, 'Deferred task dispatched');
    await this.rollUp(task.jobId);
    return providerTaskId;
  }

  /**
   * Poll until the task settles. `waited` counts sleep time only; the
   * wall-clock check parks the task before the next sleep plus one slow
   * request could carry it past the stale threshold, where another claim
   * would take it over.
   */
  private async pollUntilSettled(
    task: TaskModel,
    providerTaskId: string,
    claimedAt: number,
    log: pino.Logger
  ): Promise<void> {
    const { backoffMs, maxWaitMs, staleAfterMs, requestTimeoutMs } = this.options;
    let waited = 0;
    let attempt = 0;

    while (waited <= maxWaitMs) {
      const delay = backoffMs[Math.min(attempt, backoffMs.length - 1)] ?? 0;
      const elapsed = this.now().getTime() - claimedAt;
      if (elapsed + delay + requestTimeoutMs >= staleAfterMs) {
        log.warn({ elapsedMs: elapsed, attempt }, 'Poll lease nearly stale');
        break;
      }
      attempt += 1;

      const slept = await this.sleep(delay, this.abortController.signal);
      if (!slept || this.stopping) {
        log.info('Poller stopping, task left for recovery');
        return;
      }
      waited += delay;

      let record: ProviderStatusRecord;
      try {
        record = await this.provider.getTask(providerTaskId);
      } catch (error) {
        if (isProviderError(error) && error.transient) {
          log.debug({ error, attempt }, 'Transient provider error while polling');
          continue;
        }
        await this.failTask(task, { code: 'provider_error', message: this.describe(error) }, log);
        return;
      }

      const status = this.provider.extractStatus(record);
      if (status === 'success') {
        await this.succeedTask(task, record, log);
        return;
      }
      if (status === 'fail') {
        await this.failTask(task, this.provider.extractFailInfo(record), log, record);
        return;
      }
    }

    await this.park(task, log);
  }

  private async succeedTask(task: TaskModel, record: ProviderStatusRecord, log: pino.Logger): Promise<void> {
    const resultUrls = this.provider.extractResultUrls(record);
    const marked = await this.tasks.markSuccess(task.taskId, { resultUrls, rawResponse: record }, this.now());
    if (!marked) {
      log.warn('Task left running state before success could be recorded');
      return;
    }
    log.info({ resultCount: resultUrls.length }, 'Task succeeded');

    const job = await this.jobs.get(task.jobId);
    await this.notifySafely(
      () => this.notifications.deliverResults(task.accountId, resultUrls, this.contextFor(task, job, 0)),
      log
    );
    await this.rollUp(task.jobId);
  }

  private async failTask(
    task: TaskModel,
    info: FailInfo,
    log: pino.Logger,
    record?: ProviderStatusRecord
  ): Promise<void> {
    if (this.options.refundOnFail) {
      await this.jobs.markRefundPending(task.jobId);
    }

    const marked = await this.tasks.markFail(
      task.taskId,
      { ...info, ...(record !== undefined ? { rawResponse: record } : {}) },
      this.now()
    );
    if (!marked) {
      log.warn('Task left running state before failure could be recorded');
      return;
    }
    log.warn({ failCode: info.code, failMsg: info.message }, 'Task failed');

    let refunded = 0;
    try {
      const due = await this.settleRefunds(task.jobId);
      refunded = due.find((refund) => refund.taskId === null || refund.taskId === task.taskId)?.amount ?? 0;
    } catch (error) {
      log.error({ error, retryInMs: this.options.rescheduleDelayMs }, 'Refund settlement failed');
      this.after(this.options.rescheduleDelayMs, () => this.scheduleSettlement(task.jobId));
    }

    const job = await this.jobs.get(task.jobId);
    await this.notifySafely(
      () => this.notifications.notifyFailure(task.accountId, info.message, this.contextFor(task, job, refunded)),
      log
    );
  }

  private async park(task: TaskModel, log: pino.Logger): Promise<void> {
    const parked = await this.tasks.markPending(task.taskId);
    if (!parked) {
      return;
    }
    log.info({ retryInMs: this.options.rescheduleDelayMs }, 'Task parked as pending');
    this.scheduleAfter(task.taskId, this.options.rescheduleDelayMs);
  }

  private contextFor(task: TaskModel, job: JobModel | null, refunded: number): NotificationContext {
    return {
      jobId: task.jobId,
      taskId: task.taskId,
      unitIndex: task.unitIndex,
      model: job?.model ?? task.providerModel,
      ...(refunded > 0 ? { refunded } : {}),
    };
  }

  private async notifySafely(send: () => Promise<void>, log: pino.Logger): Promise<void> {
    try {
      await send();
    } catch (error) {
      log.error({ error }, 'Notification delivery failed');
    }
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
