/**
 * Task Poller Tests
 */

import { rollUpStatus } from '../../services/task-poller.js';
import { ProviderError } from '../../utils/errors.js';
import { LedgerReason } from '../../types/ledger.js';
import type { TaskState } from '../../types/job.js';
import { createHarness, openAccount, seedDispatchedJob, type Harness } from '../fakes/harness.js';
import { GatedSleep, RUNNING, failRecord, flush, instantSleep, successRecord } from '../fakes/providers.js';

describe('rollUpStatus', () => {
  const cases: Array<[TaskState[], string]> = [
    [[], 'running'],
    [['queued', 'success'], 'running'],
    [['pending', 'fail'], 'running'],
    [['running'], 'running'],
    [['success', 'success'], 'success'],
    [['fail', 'fail'], 'fail'],
    [['success', 'fail'], 'partial'],
  ];

  it.each(cases)('should roll %j up to %s', (states, expected) => {
    expect(rollUpStatus(states)).toBe(expected);
  });
});

describe('TaskPoller', () => {
  let h: Harness;

  afterEach(async () => {
    await h.poller.stop();
  });

  describe('outcomes', () => {
    beforeEach(() => {
      h = createHarness();
    });

    it('should refund a job whose only task fails and report the refund', async () => {
      await openAccount(h, 'acct-1', 20000);
      h.provider.script('prov-1', RUNNING, failRecord('content_policy', 'Blocked by safety filter'));

      const job = await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox' });
      await h.poller.drain();

      const [task] = await h.tasks.listByJob(job.jobId);
      expect(task?.state).toBe('fail');
      expect(task?.failCode).toBe('content_policy');
      expect(task?.failMsg).toBe('Blocked by safety filter');
      expect(task?.rawResponse).toEqual(failRecord('content_policy', 'Blocked by safety filter'));
      expect(h.jobs.only().status).toBe('fail');
      expect(h.ledger.withReason(LedgerReason.JOB_REFUND)).toEqual([
        expect.objectContaining({ delta: 5000, idempotencyKey: `refund:${job.jobId}` }),
      ]);
      expect(h.accounts.only('acct-1').balance).toBe(20000);
      expect(h.notifications.failures).toEqual([
        {
          accountId: 'acct-1',
          reason: 'Blocked by safety filter',
          context: { jobId: job.jobId, taskId: task?.taskId, unitIndex: 0, model: 'nano_banana', refunded: 5000 },
        },
      ]);
    });

    it('should refund the full charge once when every unit fails', async () => {
      await openAccount(h, 'acct-1', 20000);
      h.provider.script('prov-1', failRecord('e1', 'first'));
      h.provider.script('prov-2', failRecord('e2', 'second'));

      const job = await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox', quantity: 2 });
      await h.poller.drain();

      expect(h.jobs.only().status).toBe('fail');
      expect(h.ledger.withReason(LedgerReason.JOB_REFUND)).toEqual([
        expect.objectContaining({ delta: 10000, idempotencyKey: `refund:${job.jobId}` }),
      ]);
      expect(h.accounts.only('acct-1').balance).toBe(20000);
    });

    it('should mark a job partial and keep the charge when some units succeed', async () => {
      await openAccount(h, 'acct-1', 20000);
      h.provider.script('prov-2', failRecord('e2', 'second'));

      const job = await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox', quantity: 2 });
      await h.poller.drain();

      expect(h.tasks.statesOf(job.jobId)).toEqual(['success', 'fail']);
      expect(h.jobs.only().status).toBe('partial');
      expect(h.ledger.withReason(LedgerReason.JOB_REFUND)).toEqual([]);
      expect(h.accounts.only('acct-1').balance).toBe(10000);
      expect(h.notifications.failures[0]?.context.refunded).toBeUndefined();
    });

    it('should refund each failed unit its share under partial refunds', async () => {
      h = createHarness({ poller: { partialRefunds: true } });
      await openAccount(h, 'acct-1', 20000, { discountPct: 50 });
      h.provider.script('prov-2', failRecord('e2', 'second'));
      h.provider.script('prov-3', failRecord('e3', 'third'));

      const job = await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox', quantity: 3 });
      await h.poller.drain();

      expect(job.chargedAmount).toBe(7500);
      expect(h.jobs.only().status).toBe('partial');
      const refunds = h.ledger
        .withReason(LedgerReason.JOB_REFUND)
        .map((entry) => [entry.idempotencyKey, entry.delta])
        .sort();
      expect(refunds).toEqual([
        [`refund:${job.jobId}:unit:1`, 2500],
        [`refund:${job.jobId}:unit:2`, 2500],
      ]);
      expect(h.accounts.only('acct-1').balance).toBe(17500);
    });

    it('should not refund when refunds are disabled', async () => {
      h = createHarness({ poller: { refundOnFail: false } });
      await openAccount(h, 'acct-1', 20000);
      h.provider.script('prov-1', failRecord('e1', 'first'));

      await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox' });
      await h.poller.drain();

      expect(h.jobs.only().status).toBe('fail');
      expect(h.accounts.only('acct-1').balance).toBe(15000);
    });

    it('should post a refund that failed once when recovery runs again', async () => {
      await openAccount(h, 'acct-1', 10000);
      h.provider.script('prov-1', failRecord('content_policy', 'Blocked by safety filter'));
      h.ledger.failingRefunds = 1;

      const job = await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox' });
      await h.poller.drain();

      expect(h.jobs.only()).toMatchObject({ status: 'fail', refundPending: true });
      expect(h.accounts.only('acct-1').balance).toBe(5000);
      expect(h.notifications.failures[0]?.context.refunded).toBeUndefined();
      expect(h.poller.status().delayed).toBe(1);

      await h.poller.recover();
      await h.poller.drain();

      expect(h.jobs.only()).toMatchObject({ status: 'fail', refundPending: false });
      expect(h.ledger.withReason(LedgerReason.JOB_REFUND)).toEqual([
        expect.objectContaining({ delta: 5000, idempotencyKey: `refund:${job.jobId}` }),
      ]);
      expect(h.accounts.only('acct-1').balance).toBe(10000);
    });

    it('should settle unit refunds once however often recovery runs', async () => {
      h = createHarness({ poller: { partialRefunds: true } });
      await openAccount(h, 'acct-1', 20000);
      h.provider.script('prov-2', failRecord('e2', 'second'));
      h.ledger.failingRefunds = 1;

      const job = await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox', quantity: 2 });
      await h.poller.drain();
      await h.poller.recover();
      await h.poller.drain();
      await h.poller.recover();
      await h.poller.drain();

      expect(h.jobs.only()).toMatchObject({ status: 'partial', refundPending: false });
      expect(h.ledger.withReason(LedgerReason.JOB_REFUND)).toEqual([
        expect.objectContaining({ delta: 5000, idempotencyKey: `refund:${job.jobId}:unit:1` }),
      ]);
      expect(h.accounts.only('acct-1').balance).toBe(15000);
    });

    it('should keep polling through transient provider errors', async () => {
      await openAccount(h, 'acct-1', 20000);
      h.provider.script(
        'prov-1',
        new ProviderError('Kie recordInfo error 503: unavailable', 503),
        new ProviderError('Kie recordInfo request failed: socket hang up', null),
        successRecord('https://cdn.test/final.png')
      );

      await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox' });
      await h.poller.drain();

      expect(h.provider.pollCounts.get('prov-1')).toBe(3);
      expect(h.jobs.only().status).toBe('success');
      expect(h.notifications.delivered[0]?.urls).toEqual(['https://cdn.test/final.png']);
    });

    it('should fail a task on a permanent provider error', async () => {
      await openAccount(h, 'acct-1', 20000);
      h.provider.script('prov-1', new ProviderError('Kie recordInfo error 401: unauthorized', 401));

      await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox' });
      await h.poller.drain();

      const [task] = [...h.tasks.tasks.values()];
      expect(task?.failCode).toBe('provider_error');
      expect(task?.failMsg).toBe('Kie recordInfo error 401: unauthorized');
      expect(h.accounts.only('acct-1').balance).toBe(20000);
    });

    it('should finish the task even when notification delivery fails', async () => {
      await openAccount(h, 'acct-1', 20000);
      h.notifications.broken = true;

      await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'a fox' });
      await h.poller.drain();

      expect(h.jobs.only().status).toBe('success');
    });

    it('should keep the cached balance equal to the sum of ledger entries', async () => {
      await openAccount(h, 'acct-1', 50000);
      h.provider.script('prov-2', failRecord('e', 'x'));
      h.provider.script('prov-3', failRecord('e', 'x'));
      h.provider.script('prov-4', failRecord('e', 'x'));

      await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'one', quantity: 2 });
      await h.orchestrator.create({ accountId: 'acct-1', model: 'nano_banana', prompt: 'two', quantity: 2 });
      await h.poller.drain();

      await expect(h.jobs.listByAccount('acct-1', 10)).resolves.toHaveLength(2);
      expect(h.accounts.only('acct-1').balance).toBe(h.ledger.sumFor('acct-1'));
      expect(h.accounts.only('acct-1').balance).toBe(40000);
    });
  });

  describe('scheduling', () => {
    it('should poll a task once however often it is scheduled', async () => {
      h = createHarness();
      await openAccount(h, 'acct-1', 0);
      const { tasks } = await seedDispatchedJob(h, 'acct-1', 1);
      const taskId = tasks[0]?.taskId ?? '';

      h.poller.schedule(taskId);
      h.poller.schedule(taskId);
      h.poller.schedule(taskId);
      await h.poller.drain();

      expect(h.tasks.claimCalls).toBe(3);
      expect(h.provider.pollCounts.get('ext-1')).toBe(1);
      expect(h.notifications.delivered).toHaveLength(1);
      expect((await h.tasks.get(taskId))?.attempts).toBe(1);
    });

    it('should park a task as pending after the maximum wait', async () => {
      const delays: number[] = [];
      h = createHarness({ sleep: instantSleep(delays), poller: { backoffMs: [1000, 2000], maxWaitMs: 5000 } });
      await openAccount(h, 'acct-1', 0);
      const { job, tasks } = await seedDispatchedJob(h, 'acct-1', 1);
      h.provider.script('ext-1', RUNNING);

      h.poller.schedule(tasks[0]?.taskId ?? '');
      await h.poller.drain();

      expect(delays).toEqual([1000, 2000, 2000, 2000]);
      expect(h.provider.pollCounts.get('ext-1')).toBe(4);
      expect(h.tasks.statesOf(job.jobId)).toEqual(['pending']);
      expect(h.poller.status().delayed).toBe(1);
      expect(h.jobs.only().status).toBe('running');
    });

    it('should park a task before its poll lease could go stale', async () => {
      let clock = Date.parse('2025-03-01T10:00:00.000Z');
      const delays: number[] = [];
      h = createHarness({
        now: () => new Date(clock),
        sleep: async (ms) => {
          delays.push(ms);
          clock += ms;
          return true;
        },
        poller: { backoffMs: [1000], maxWaitMs: 60000, staleAfterMs: 10000, requestTimeoutMs: 4000 },
      });
      await openAccount(h, 'acct-1', 0);
      const { job, tasks } = await seedDispatchedJob(h, 'acct-1', 1);
      h.provider.script('ext-1', RUNNING);

      h.poller.schedule(tasks[0]?.taskId ?? '');
      await h.poller.drain();

      expect(delays).toEqual([1000, 1000, 1000, 1000, 1000]);
      expect(h.provider.pollCounts.get('ext-1')).toBe(5);
      expect(h.tasks.statesOf(job.jobId)).toEqual(['pending']);
    });

    it('should bound the number of tasks polled at once', async () => {
      const gate = new GatedSleep();
      h = createHarness({ sleep: gate.sleep, poller: { globalConcurrency: 2, perAccountConcurrency: 2 } });
      await openAccount(h, 'acct-1', 0);
      await openAccount(h, 'acct-2', 0);
      const first = await seedDispatchedJob(h, 'acct-1', 2);
      const second = await seedDispatchedJob(h, 'acct-2', 2);

      for (const task of [...first.tasks, ...second.tasks]) {
        h.poller.schedule(task.taskId);
      }
      await flush();

      expect(gate.sleepers).toBe(2);
      expect(h.poller.status().inFlight).toBe(4);

      gate.releaseAll();
      await flush();

      expect(gate.sleepers).toBe(2);

      gate.releaseAll();
      await h.poller.drain();

      expect(h.tasks.allTerminal()).toBe(true);
    });

    it('should bound the number of tasks polled at once for one account', async () => {
      const gate = new GatedSleep();
      h = createHarness({ sleep: gate.sleep, poller: { globalConcurrency: 10, perAccountConcurrency: 1 } });
      await openAccount(h, 'acct-1', 0);
      await openAccount(h, 'acct-2', 0);
      const busy = await seedDispatchedJob(h, 'acct-1', 3);
      const quiet = await seedDispatchedJob(h, 'acct-2', 1);

      for (const task of [...busy.tasks, ...quiet.tasks]) {
        h.poller.schedule(task.taskId);
      }
      await flush();

      expect(gate.sleepers).toBe(2);
      expect(h.poller.status().accountsActive).toBe(2);
    });

    it('should resume queued, pending and stale running tasks on recovery', async () => {
      h = createHarness();
      await openAccount(h, 'acct-1', 0);
      const now = Date.now();
      const queued = await seedDispatchedJob(h, 'acct-1', 1);
      const pending = await seedDispatchedJob(h, 'acct-1', 1, { state: 'pending' });
      const stale = await seedDispatchedJob(h, 'acct-1', 1, { state: 'running', startedAt: new Date(now - 700000) });
      const fresh = await seedDispatchedJob(h, 'acct-1', 1, { state: 'running', startedAt: new Date(now - 1000) });
      const done = await seedDispatchedJob(h, 'acct-1', 1, { state: 'success' });

      const count = await h.poller.recover();
      await h.poller.drain();

      expect(count).toBe(3);
      expect(h.tasks.statesOf(queued.job.jobId)).toEqual(['success']);
      expect(h.tasks.statesOf(pending.job.jobId)).toEqual(['success']);
      expect(h.tasks.statesOf(stale.job.jobId)).toEqual(['success']);
      expect(h.tasks.statesOf(fresh.job.jobId)).toEqual(['running']);
      expect(h.tasks.statesOf(done.job.jobId)).toEqual(['success']);
      expect(h.provider.pollCounts.has('ext-4')).toBe(false);
    });

    it('should not let a stale roll-up undo a terminal job status', async () => {
      h = createHarness();
      await openAccount(h, 'acct-1', 0);
      const { job, tasks } = await seedDispatchedJob(h, 'acct-1', 2, { state: 'running', startedAt: new Date() });
      await h.jobs.updateStatus(job.jobId, 'pending');

      let release: () => void = () => undefined;
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });
      const transition = h.jobs.transitionStatus.bind(h.jobs);
      jest.spyOn(h.jobs, 'transitionStatus').mockImplementationOnce(async (jobId, from, to) => {
        await held;
        return transition(jobId, from, to);
      });

      const stale = h.poller.rollUp(job.jobId);
      await flush();
      for (const task of tasks) {
        await h.tasks.markSuccess(task.taskId, { resultUrls: [], rawResponse: {} }, new Date());
      }
      await expect(h.poller.rollUp(job.jobId)).resolves.toMatchObject({ status: 'success' });

      release();

      await expect(stale).resolves.toMatchObject({ status: 'success' });
      expect(h.jobs.only().status).toBe('success');
      expect(h.jobs.history.map((entry) => entry.status)).toEqual(['pending', 'success']);
    });

    it('should leave interrupted tasks running when stopped', async () => {
      const gate = new GatedSleep();
      h = createHarness({ sleep: gate.sleep });
      await openAccount(h, 'acct-1', 0);
      const { job, tasks } = await seedDispatchedJob(h, 'acct-1', 1);

      h.poller.schedule(tasks[0]?.taskId ?? '');
      await flush();
      await h.poller.stop();

      expect(h.tasks.statesOf(job.jobId)).toEqual(['running']);
      expect(h.poller.status()).toEqual({ inFlight: 0, delayed: 0, accountsActive: 0, stopping: true });

      h.poller.schedule(tasks[0]?.taskId ?? '');
      expect(h.poller.status().inFlight).toBe(0);
    });
  });
});
