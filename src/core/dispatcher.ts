/**
 * Dispatcher: runs one synthetic load test.
 *
 * Every request of a run is scheduled up front behind a shared concurrency
 * limiter. Outcomes are consumed in fixed-size batches, in order; after each
 * batch the circuit breaker decides whether the run continues. When it trips,
 * the run's abort signal cancels whatever has not finished yet.
 *
 * A Dispatcher owns its HTTP session between open() and close(). Use
 * withDispatcher() or runLoad() to get the release on every exit path.
 *
 * @module
 */

import { setMaxListeners } from "node:events";
import { FailureRateBreaker } from "../adapters/failure-rate-breaker.js";
import { SemaphoreLimiter } from "../adapters/semaphore-limiter.js";
import { UndiciHttpSession } from "../adapters/undici-http-session.js";
import { ConfigurationError, errorMessage, SessionLifecycleError } from "../errors.js";
import type { CircuitBreaker } from "../interfaces/circuit-breaker.js";
import type { ConcurrencyLimiter } from "../interfaces/concurrency-limiter.js";
import type { HttpSession } from "../interfaces/http-session.js";
import type { Logger } from "../interfaces/logger.js";
import {
  type DispatcherConfig,
  type DispatcherConfigInput,
  effectiveBatchSize,
  type RunConfigInput,
  resolveDispatcherConfig,
  resolveRunConfig,
} from "../types/config.js";
import type { RunResult, TaskResult } from "../types/run.js";
import { noopLogger } from "../utils/noop-logger.js";
import { generatePath, newTokenPool, type RandomSource } from "./path-generator.js";
import { exponentialBackoff, type Sleep } from "./retry.js";
import { RetryPolicy } from "./retry-policy.js";

export interface DispatcherDeps {
  logger?: Logger;
  sessionFactory?: (config: Readonly<DispatcherConfig>) => HttpSession;
  createLimiter?: (capacity: number) => ConcurrencyLimiter;
  random?: RandomSource;
  sleep?: Sleep;
  /** Cleanup invoked once when the breaker trips. Failures are logged. */
  onTrip?: () => Promise<void> | void;
}

interface OpenScope {
  session: HttpSession;
  limiter: ConcurrencyLimiter;
}

/** Reason attached to the run's abort signal when the breaker trips. */
export class CircuitOpenSignal extends Error {
  constructor() {
    super("Circuit breaker open");
    this.name = "CircuitOpenSignal";
  }
}

export class Dispatcher {
  readonly config: Readonly<DispatcherConfig>;
  private readonly deps: DispatcherDeps;
  private readonly logger: Logger;
  private scope: OpenScope | null = null;
  private closed = false;

  constructor(config: DispatcherConfigInput, deps: DispatcherDeps = {}) {
    this.config = resolveDispatcherConfig(config);
    this.deps = deps;
    this.logger = deps.logger ?? noopLogger;
  }

  get isOpen(): boolean {
    return this.scope !== null;
  }

  async open(): Promise<void> {
    if (this.scope) throw new SessionLifecycleError("Dispatcher is already open");
    if (this.closed) throw new SessionLifecycleError("Dispatcher has been closed");

    const { config, deps } = this;
    const session =
      deps.sessionFactory?.(config) ??
      new UndiciHttpSession({ connections: config.maxConcurrentRequests });
    const limiter =
      deps.createLimiter?.(config.maxConcurrentRequests) ??
      new SemaphoreLimiter(config.maxConcurrentRequests);

    this.scope = { session, limiter };
  }

  async close(): Promise<void> {
    const scope = this.scope;
    this.scope = null;
    this.closed = true;
    if (scope) await scope.session.close();
  }

  async run(requested: number): Promise<RunResult> {
    if (!Number.isInteger(requested) || requested <= 0) {
      throw new ConfigurationError(
        `Invalid configuration: totalRequests must be a positive integer, got ${requested}`,
      );
    }
    const scope = this.scope;
    if (!scope) {
      throw new SessionLifecycleError("Dispatcher.run() called outside open()/close()");
    }

    const { session, limiter } = scope;
    const { config } = this;
    const random = this.deps.random ?? Math.random;
    const batchSize = effectiveBatchSize(config);

    // Per run, so overlapping runs on one scope never share counters
    const breaker: CircuitBreaker = new FailureRateBreaker({
      failureThreshold: config.failureThreshold,
      minSampleSize: config.minSampleSize,
      onTrip: this.deps.onTrip,
      logger: this.logger,
    });
    const tokens = newTokenPool(random);
    const controller = new AbortController();
    // Every queued permit, backoff wait and in-flight request listens on this signal
    setMaxListeners(0, controller.signal);
    const policy = new RetryPolicy({
      session,
      baseUrl: config.baseUrl,
      maxAttempts: config.maxRetryAttempts,
      timeoutMs: config.requestTimeoutMs,
      backoff: exponentialBackoff({ baseMs: config.backoffBaseMs, capMs: config.backoffCapMs }),
      sleep: this.deps.sleep,
      logger: this.logger,
    });

    this.logger.info("Load run started", {
      baseUrl: config.baseUrl,
      requested,
      maxConcurrentRequests: config.maxConcurrentRequests,
      batchSize,
    });

    const tasks: Array<Promise<TaskResult>> = [];
    for (let i = 0; i < requested; i++) {
      const path = generatePath(tokens, random);
      tasks.push(this.schedule(limiter, policy, path, controller.signal));
    }

    for (let start = 0; start < tasks.length; start += batchSize) {
      const results = await Promise.all(tasks.slice(start, start + batchSize));
      for (const result of results) record(breaker, result);

      if (breaker.shouldTrip()) {
        controller.abort(new CircuitOpenSignal());
        break;
      }
    }

    // Let cancelled tasks unwind so every permit and socket is returned
    await Promise.all(tasks);
    await breaker.settled();

    const result = breaker.snapshot(requested, requested - breaker.totalRequests(), tokens);
    this.logger.info("Load run finished", {
      successful: result.successfulRequests,
      failed: result.failedRequests,
      cancelled: result.totalCancelled,
      circuitBreakerTriggered: result.circuitBreakerTriggered,
    });
    return result;
  }

  private async schedule(
    limiter: ConcurrencyLimiter,
    policy: RetryPolicy,
    path: string,
    signal: AbortSignal,
  ): Promise<TaskResult> {
    try {
      return await limiter.run(() => policy.attempt(path, signal), signal);
    } catch (err) {
      if (signal.aborted) return { kind: "cancelled", path, attempts: 0 };
      return { kind: "error", path, detail: errorMessage(err) };
    }
  }
}

function record(breaker: CircuitBreaker, result: TaskResult): void {
  switch (result.kind) {
    case "success":
      breaker.recordSuccess();
      return;
    case "permanent_failure":
      breaker.recordFailure(`HTTP ${result.status} for ${result.path}`);
      return;
    case "transient_exhausted":
      breaker.recordFailure(`${result.reason} for ${result.path} after ${result.attempts} attempts`);
      return;
    case "error":
      breaker.recordFailure(result.detail);
      return;
    case "cancelled":
      return;
  }
}

/** Open a dispatcher, hand it to `fn`, and close it however `fn` exits. */
export async function withDispatcher<T>(
  config: DispatcherConfigInput,
  deps: DispatcherDeps,
  fn: (dispatcher: Dispatcher) => Promise<T>,
): Promise<T> {
  const dispatcher = new Dispatcher(config, deps);
  await dispatcher.open();
  try {
    return await fn(dispatcher);
  } finally {
    await dispatcher.close();
  }
}

/** Validate a full run configuration, then execute it in its own scope. */
export async function runLoad(config: RunConfigInput, deps: DispatcherDeps = {}): Promise<RunResult> {
  const { totalRequests, ...settings } = resolveRunConfig(config);
  return withDispatcher(settings, deps, (dispatcher) => dispatcher.run(totalRequests));
}
