import { CancellationError } from "./errors";

/**
 * Counting semaphore shared by every level of a summarization run.
 * Slots are handed out in request order.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  /** Number of tasks currently holding a slot. */
  get activeCount(): number {
    return this.active;
  }

  /** Number of tasks waiting for a slot. */
  get pendingCount(): number {
    return this.waiting.length;
  }

  /**
   * Runs the task once a slot is free and releases the slot when it settles.
   * Waiting tasks are dropped with a CancellationError when the signal fires.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancellationError());
    }
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiting.indexOf(waiter);
        if (index !== -1) {
          this.waiting.splice(index, 1);
        }
        reject(new CancellationError());
      };
      const waiter = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next();
      return;
    }
    this.active--;
  }
}
