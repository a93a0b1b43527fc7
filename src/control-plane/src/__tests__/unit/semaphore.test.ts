/**
 * Semaphore tests
 */

import { Semaphore } from '../../utils/semaphore.js';
import { flush } from '../fakes/providers.js';

describe('Semaphore', () => {
  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it('should never let more than capacity holders in', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;
    const gates: Array<() => void> = [];

    const work = (): Promise<void> =>
      semaphore.use(async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise<void>((resolve) => gates.push(resolve));
        active -= 1;
      });

    const all = Promise.all([work(), work(), work(), work(), work()]);
    await flush();

    expect(semaphore.inUse).toBe(2);
    expect(semaphore.waiting).toBe(3);

    while (gates.length > 0) {
      gates.shift()?.();
      await flush();
    }
    await all;

    expect(peak).toBe(2);
    expect(semaphore.inUse).toBe(0);
    expect(semaphore.waiting).toBe(0);
  });

  it('should hand permits to waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    semaphore.release();
    expect(semaphore.inUse).toBe(0);
  });

  it('should release the permit when the work throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.use(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(semaphore.inUse).toBe(0);
  });

  it('should refuse a release without an acquire', () => {
    const semaphore = new Semaphore(1);
    expect(() => semaphore.release()).toThrow('Semaphore released more times than acquired');
  });
});
