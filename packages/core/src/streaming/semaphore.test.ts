import { describe, expect, it } from 'vitest';
import { Semaphore } from './semaphore.js';

describe('Semaphore', () => {
  it('should never block when unbounded', async () => {
    const semaphore = new Semaphore(0);
    await Promise.all([semaphore.acquire(), semaphore.acquire(), semaphore.acquire()]);
    expect(semaphore.inFlight).toBe(3);
    expect(semaphore.pending).toBe(0);
  });

  it('should queue acquirers beyond the limit in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    const releaseFirst = await semaphore.acquire();
    const second = semaphore.acquire().then((release) => {
      order.push('second');
      return release;
    });
    const third = semaphore.acquire().then((release) => {
      order.push('third');
      return release;
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    expect(semaphore.pending).toBe(2);

    releaseFirst();
    const releaseSecond = await second;
    expect(order).toEqual(['second']);
    expect(semaphore.inFlight).toBe(1);

    releaseSecond();
    const releaseThird = await third;
    expect(order).toEqual(['second', 'third']);

    releaseThird();
    expect(semaphore.inFlight).toBe(0);
  });

  it('should ignore repeated release calls', async () => {
    const semaphore = new Semaphore(2);
    const release = await semaphore.acquire();
    await semaphore.acquire();

    release();
    release();

    expect(semaphore.inFlight).toBe(1);
  });
});
