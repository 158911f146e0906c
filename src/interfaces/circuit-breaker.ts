import type { RunResult } from "../types/run.js";

/**
 * Failure-rate circuit breaker.
 * A one-shot latch: once it opens during a run it stays open until `reset()`.
 *
 * States: CLOSED (initial) → OPEN (terminal)
 */
export interface CircuitBreaker {
  /** Record a successful request. */
  recordSuccess(): void;

  /**
   * Record a failed request.
   * `detail` is advisory and only used for diagnostics.
   */
  recordFailure(detail?: string): void;

  /**
   * Evaluate the trip rule and return whether the breaker is open.
   * The closed → open transition and its side effects happen at most once.
   */
  shouldTrip(): boolean;

  /** Number of recorded outcomes (successes + failures). */
  totalRequests(): number;

  failureRate(): number;

  completionRate(): number;

  getState(): "closed" | "open";

  /** Resolves once any cleanup started by a trip has finished. */
  settled(): Promise<void>;

  /** Build the terminal report for a run. */
  snapshot(totalRequested: number, totalCancelled: number, tokens: readonly string[]): RunResult;

  /** Zero all counters and close the breaker. Only between runs. */
  reset(): void;
}
