import { ConcurrencyLimiter } from './concurrency-limiter.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConcurrencyLimiter', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });

  it('never runs more than the limit at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;

    const task = async (): Promise<number> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return running;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => limiter.run(task)));

    expect(peak).toBe(2);
    expect(limiter.activeCount).toBe(0);
  });

  it('starts waiters in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred();
    const order: string[] = [];

    const first = limiter.run(async () => {
      await gate.promise;
      order.push('first');
    });
    const second = limiter.run(async () => {
      order.push('second');
    });
    const third = limiter.run(async () => {
      order.push('third');
    });

    expect(limiter.pendingCount).toBe(2);
    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('releases the slot when a task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limiter.run(async () => 'after')).resolves.toBe('after');
    expect(limiter.activeCount).toBe(0);
  });
});
