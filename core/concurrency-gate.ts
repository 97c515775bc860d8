export interface SemaphoreSnapshot {
  limit: number;
  active: number;
  queued: number;
}

export class Semaphore {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  snapshot(): SemaphoreSnapshot {
    return { limit: this.limit, active: this.active, queued: this.queue.length };
  }

  private async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active += 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // slot passes straight to the next waiter
      next();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }
}

export interface ConcurrencyGateOptions {
  itemConcurrency: number;
  commentConcurrency: number;
}

/**
 * Two independent slot counters shared by every mode handler: one for item-detail fetches and
 * one for whole comment threads.
 */
export class ConcurrencyGate {
  readonly item: Semaphore;
  readonly comment: Semaphore;

  constructor(options: ConcurrencyGateOptions) {
    this.item = new Semaphore(options.itemConcurrency);
    this.comment = new Semaphore(options.commentConcurrency);
  }

  runItem<T>(task: () => Promise<T>): Promise<T> {
    return this.item.use(task);
  }

  runComment<T>(task: () => Promise<T>): Promise<T> {
    return this.comment.use(task);
  }

  snapshot(): { item: SemaphoreSnapshot; comment: SemaphoreSnapshot } {
    return { item: this.item.snapshot(), comment: this.comment.snapshot() };
  }
}
