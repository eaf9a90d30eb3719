import { describe, expect, it } from 'vitest';
import { Semaphore } from '../../src/utils/semaphore.js';
import { delay } from '../helpers/fakes.js';

describe('Semaphore', () => {
  it('rejects a non-positive permit count', () => {
    expect(() => new Semaphore(0)).toThrow('permits must be a positive integer');
  });

  it('never runs more tasks than it has permits', async () => {
    const sem = new Semaphore(2);
    let active = 0;
    let peak = 0;
    const task = () => sem.run(async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    await Promise.all([task(), task(), task(), task(), task()]);
    expect(peak).toBe(2);
    expect(sem.inUse).toBe(0);
  });

  it('hands permits to waiters in arrival order', async () => {
    const sem = new Semaphore(1);
    const order: number[] = [];
    const release = await sem.acquire();

    const waiters = [1, 2, 3].map(n => sem.run(async () => { order.push(n); }));
    expect(sem.waiting).toBe(3);

    release();
    await Promise.all(waiters);
    expect(order).toEqual([1, 2, 3]);
  });

  it('ignores a second release of the same permit', async () => {
    const sem = new Semaphore(1);
    const release = await sem.acquire();
    release();
    release();
    expect(sem.inUse).toBe(0);

    await sem.acquire();
    expect(sem.inUse).toBe(1);
  });

  it('releases the permit when the task throws', async () => {
    const sem = new Semaphore(1);
    await expect(sem.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(sem.inUse).toBe(0);
  });
});
