import type { CircuitBreaker } from "../interfaces/circuit-breaker.js";
import type { Logger } from "../interfaces/logger.js";
import type { RunResult } from "../types/run.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface FailureRateBreakerOptions {
  /** Highest tolerated failure fraction, in [0, 1]. */
  failureThreshold: number;
  /** Outcomes required before the rate is evaluated. */
  minSampleSize: number;
  /** Runs once, when the breaker opens. Errors are logged and dropped. */
  onTrip?: () => Promise<void> | void;
  logger?: Logger;
}

/**
 * Circuit breaker over the cumulative failure rate of a run.
 *
 * CLOSED: outcomes are counted; trips once
 *   total >= minSampleSize and failed / total > failureThreshold
 * OPEN: absorbing until reset()
 */
export class FailureRateBreaker implements CircuitBreaker {
  private state: "closed" | "open" = "closed";
  private successful = 0;
  private failed = 0;
  private cleanup: Promise<void> | null = null;

  private readonly failureThreshold: number;
  private readonly minSampleSize: number;
  private readonly onTrip: (() => Promise<void> | void) | undefined;
  private readonly logger: Logger;

  constructor(options: FailureRateBreakerOptions) {
    this.failureThreshold = options.failureThreshold;
    this.minSampleSize = options.minSampleSize;
    this.onTrip = options.onTrip;
    this.logger = options.logger ?? noopLogger;
  }

  recordSuccess(): void {
    this.successful++;
  }

  recordFailure(detail?: string): void {
    this.failed++;
    if (detail) this.logger.debug?.("Request failed", { detail });
  }

  shouldTrip(): boolean {
    if (this.state === "open") return true;

    const total = this.totalRequests();
    if (total < this.minSampleSize) return false;

    const rate = this.failureRate();
    if (rate <= this.failureThreshold) return false;

    this.state = "open";
    this.logger.warn("Circuit breaker tripped", {
      failureRate: rate,
      failureThreshold: this.failureThreshold,
      totalRequests: total,
    });
    this.startCleanup();
    return true;
  }

  totalRequests(): number {
    return this.successful + this.failed;
  }

  failureRate(): number {
    const total = this.totalRequests();
    return total === 0 ? 0 : this.failed / total;
  }

  completionRate(): number {
    const total = this.totalRequests();
    return total === 0 ? 0 : this.successful / total;
  }

  getState(): "closed" | "open" {
    return this.state;
  }

  settled(): Promise<void> {
    return this.cleanup ?? Promise.resolve();
  }

  snapshot(totalRequested: number, totalCancelled: number, tokens: readonly string[]): RunResult {
    const total = this.totalRequests();
    const tripped = this.state === "open";
    return {
      successfulRequests: this.successful,
      failedRequests: this.failed,
      totalCompleted: total,
      totalCancelled,
      completionRate: this.completionRate(),
      failureRate: this.failureRate(),
      circuitBreakerTriggered: tripped,
      message: tripped
        ? `Generated ${total} of ${totalRequested} requested fake requests (stopped by circuit breaker)`
        : `Generated ${totalRequested} fake requests`,
      tokens: [...tokens],
    };
  }

  reset(): void {
    this.state = "closed";
    this.successful = 0;
    this.failed = 0;
    this.cleanup = null;
  }

  private startCleanup(): void {
    if (!this.onTrip) return;
    try {
      this.cleanup = Promise.resolve(this.onTrip()).then(
        () => {
          this.logger.info("Trip cleanup finished");
        },
        (err: unknown) => {
          this.logger.warn("Trip cleanup failed", { error: err });
        },
      );
    } catch (err) {
      this.logger.warn("Trip cleanup failed", { error: err });
    }
  }
}
