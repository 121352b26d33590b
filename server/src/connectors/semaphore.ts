/**
 * Counting semaphore. `acquire()` resolves with a release function once a
 * permit is free; waiters are served in FIFO order.
 */
export class Semaphore {
  private permits: number;
  private waiters: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Semaphore size must be a positive integer (got ${size})`);
    }
    this.permits = size;
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.releaser();
    }
    return new Promise(resolve => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      // Hand the permit straight to the next waiter.
      if (next) next();
      else this.permits++;
    };
  }
}
