import { describe, expect, it } from 'vitest';

import { Semaphore } from '../src/semaphore';

describe('Semaphore', () => {
  it('should reject non-positive or fractional capacities', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it('should grant permits immediately up to capacity', async () => {
    const semaphore = new Semaphore(2);

    await semaphore.acquire();
    await semaphore.acquire();

    expect(semaphore.available).toBe(0);
    expect(semaphore.inUse).toBe(2);
  });

  it('should queue callers beyond capacity and admit them in order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    expect(semaphore.waiting).toBe(2);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.waiting).toBe(0);
    expect(semaphore.inUse).toBe(1);
  });

  it('should never run more tasks than its capacity', async () => {
    const semaphore = new Semaphore(3);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 20 }, () =>
        semaphore.use(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise((resolve) => setTimeout(resolve, 5));
          running--;
        }),
      ),
    );

    expect(peak).toBe(3);
    expect(semaphore.available).toBe(3);
  });

  it('should release the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.use(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(semaphore.available).toBe(1);
  });

  it('should throw when released more times than acquired', () => {
    const semaphore = new Semaphore(1);
    expect(() => semaphore.release()).toThrow(
      'Semaphore released more times than it was acquired',
    );
  });

  it('should stay bounded while the queue never drains', async () => {
    const semaphore = new Semaphore(1);
    const admitted: number[] = [];
    let nextId = 0;
    const enqueue = (): void => {
      const id = nextId++;
      void semaphore.acquire().then(() => {
        admitted.push(id);
      });
    };

    await semaphore.acquire();
    for (let i = 0; i < 10; i++) enqueue();
    for (let i = 0; i < 10_000; i++) {
      semaphore.release();
      enqueue();
    }
    await new Promise((resolve) => setImmediate(resolve));

    expect(semaphore.waiting).toBe(10);
    expect(admitted).toHaveLength(10_000);
    expect(admitted.every((id, index) => id === index)).toBe(true);

    const queue: unknown = Reflect.get(semaphore, 'waiters');
    expect(Array.isArray(queue) ? queue.length : -1).toBeGreaterThanOrEqual(10);
    expect(Array.isArray(queue) ? queue.length : Infinity).toBeLessThan(64);
  });
});
