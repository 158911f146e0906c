/**
 * Concurrency limiter interface.
 * A counting permit pool: at most `capacity` tasks run at once.
 */
export interface ConcurrencyLimiter {
  readonly capacity: number;

  /** Permits currently held. */
  readonly active: number;

  /**
   * Run `task` while holding a permit. The permit is released whether the task
   * resolves or rejects. If `signal` aborts while waiting for a permit, the
   * returned promise rejects with the signal's reason and no permit is taken.
   */
  run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T>;
}
