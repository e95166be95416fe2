/** Admitted waiters kept before the queue is compacted. */
const COMPACT_THRESHOLD = 32;

/**
 * A counting admission gate. Waiters are admitted in FIFO order and a
 * permit is handed directly to the next waiter on release, so the number
 * of holders never exceeds the permit count.
 */
export class Semaphore {
  private readonly capacity: number;
  private permits: number;
  private waiters: Array<() => void> = [];
  private head = 0;

  /**
   * @param capacity Maximum number of concurrent holders. Must be a positive integer.
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Semaphore capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
    this.permits = capacity;
  }

  /** Permits not currently held. */
  get available(): number {
    return this.permits;
  }

  /** Permits currently held. */
  get inUse(): number {
    return this.capacity - this.permits;
  }

  /** Callers queued for a permit. */
  get waiting(): number {
    return this.waiters.length - this.head;
  }

  /**
   * Resolves once a permit has been granted to the caller.
   */
  acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Returns a permit, handing it to the oldest waiter if there is one.
   */
  release(): void {
    if (this.head < this.waiters.length) {
      const next = this.waiters[this.head];
      this.head++;
      if (this.head === this.waiters.length) {
        this.waiters = [];
        this.head = 0;
      } else if (
        this.head >= COMPACT_THRESHOLD &&
        this.head * 2 >= this.waiters.length
      ) {
        // drop admitted waiters so a queue that never drains stays bounded
        this.waiters = this.waiters.slice(this.head);
        this.head = 0;
      }
      next();
      return;
    }
    if (this.permits >= this.capacity) {
      throw new Error('Semaphore released more times than it was acquired');
    }
    this.permits++;
  }

  /**
   * Runs `task` while holding a permit. The permit is released however the
   * task settles.
   */
  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
