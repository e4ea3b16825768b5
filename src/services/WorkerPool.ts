import { logger } from '../infra/logger.js';

type Waiter = () => void;

/**
 * In-process bounded concurrency with a FIFO waiting queue.
 * A slot is handed directly from the releasing task to the next waiter.
 */
export class WorkerPool {
  private active = 0;
  private waiters: Waiter[] = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${maxConcurrent}`);
    }
  }

  async run<T>(label: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(label);
    try {
      return await task();
    } finally {
      this.release(label);
    }
  }

  getStats(): { active: number; queued: number; max: number } {
    return { active: this.active, queued: this.waiters.length, max: this.maxConcurrent };
  }

  private async acquire(label: string): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return;
    }

    const startTime = Date.now();
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
    logger.debug('Worker slot acquired after waiting', {
      label,
      waitMs: Date.now() - startTime,
    });
  }

  private release(label: string): void {
    const next = this.waiters.shift();
    if (next) {
      // active count is unchanged: the slot passes to the waiter
      next();
    } else {
      this.active -= 1;
    }
    logger.debug('Worker slot released', { label, handedOff: next !== undefined });
  }
}
