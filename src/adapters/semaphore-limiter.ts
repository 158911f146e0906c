import type { ConcurrencyLimiter } from "../interfaces/concurrency-limiter.js";

interface Waiter {
  grant: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore.
 * Permits are handed to waiters in FIFO order. A released permit goes straight
 * to the next waiter, so `active` never drops and rises again in between.
 */
export class SemaphoreLimiter implements ConcurrencyLimiter {
  readonly capacity: number;
  private _active = 0;
  private _peak = 0;
  private waiters: Waiter[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get active(): number {
    return this._active;
  }

  get available(): number {
    return this.capacity - this._active;
  }

  /** Highest `active` value observed since construction. */
  get peak(): number {
    return this._peak;
  }

  /** Tasks waiting for a permit. */
  get pending(): number {
    return this.waiters.length;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(signal.reason);

    if (this._active < this.capacity) {
      this.take();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(signal.reason);
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      if (next.onAbort) next.signal?.removeEventListener("abort", next.onAbort);
      next.grant();
      return;
    }
    this._active--;
  }

  private take(): void {
    this._active++;
    this._peak = Math.max(this._peak, this._active);
  }
}
