/**
 * Runs async work with at most `width` operations in flight.
 * Waiting callers resume in the order they arrived.
 */
export class BoundedExecutor {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly width: number) {
    if (!Number.isInteger(width) || width < 1) {
      throw new RangeError(`Executor width must be a positive integer, got ${width}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.width) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next !== undefined) {
      // Hand the slot straight to the next waiter.
      next();
      return;
    }
    this.active--;
  }
}
