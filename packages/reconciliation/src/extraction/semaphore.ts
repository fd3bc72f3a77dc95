import { ReceivingError } from '@intake/core';

/**
 * Counting semaphore bounding how many recognition calls run at once
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<(release: () => void) => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ReceivingError({
        code: 'INVALID_CONFIG',
        stage: 'config',
        message: `Concurrency must be an integer >= 1 (got ${limit})`,
      });
    }
  }

  get inFlight(): number {
    return this.active;
  }

  async acquire(): Promise<() => void> {
    if (this.active < this.limit) {
      this.active++;
      return this.createRelease();
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `task` once a slot is free; the slot is released however the task ends.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand the slot straight to the next waiter.
        next(this.createRelease());
      } else {
        this.active--;
      }
    };
  }
}
