/**
 * Counting admission gate. `acquire` resolves once one of the permits is free;
 * waiters are admitted in arrival order.
 */
export class ConcurrencyGate {
  private available: number;
  private waiters: (() => void)[] = [];
  private held = 0;
  private peak = 0;

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits <= 0) {
      throw new RangeError(`permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  get inUse(): number {
    return this.held;
  }

  /** Highest number of permits held at once. */
  get highWater(): number {
    return this.peak;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      this.take();
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiters.push(() => {
        this.take();
        resolve();
      });
    });
  }

  release(): void {
    if (this.held === 0) {
      throw new Error('ConcurrencyGate.release() called without a held permit');
    }
    this.held--;
    const next = this.waiters.shift();
    if (next) {
      // Hand the permit straight to the next waiter.
      next();
    } else {
      this.available++;
    }
  }

  /** Runs `task` while holding a permit; the permit is returned on every exit path. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private take(): void {
    this.held++;
    this.peak = Math.max(this.peak, this.held);
  }
}
