/**
 * loadprobe public API barrel.
 *
 * Re-exports the dispatcher, its building blocks, the counter service and the
 * shared types that make up the public surface of the `loadprobe` package.
 * @module
 */

// Adapters
export type { FailureRateBreakerOptions } from "./adapters/failure-rate-breaker.js";
export { FailureRateBreaker } from "./adapters/failure-rate-breaker.js";
export { MemoryCounterStore } from "./adapters/memory-counter-store.js";
export { SemaphoreLimiter } from "./adapters/semaphore-limiter.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { UndiciHttpSessionOptions } from "./adapters/undici-http-session.js";
export { UndiciHttpSession } from "./adapters/undici-http-session.js";
// Config
export { dispatcherConfigSchema, runConfigSchema } from "./config/config-schema.js";
// Core
export type { DispatcherDeps } from "./core/dispatcher.js";
export { CircuitOpenSignal, Dispatcher, runLoad, withDispatcher } from "./core/dispatcher.js";
export type { RandomSource } from "./core/path-generator.js";
export { generatePath, generateToken, newTokenPool } from "./core/path-generator.js";
export type {
  BackoffSchedule,
  RetryOptions,
  RetryResult,
  Settled,
  Sleep,
  Verdict,
} from "./core/retry.js";
export { abortableSleep, exponentialBackoff, retry } from "./core/retry.js";
export type { RetryPolicyOptions, StatusClass } from "./core/retry-policy.js";
export { classifyStatus, RetryPolicy, SYNTHETIC_TRAFFIC_HEADER } from "./core/retry-policy.js";
export { registerSignalHandlers } from "./daemon/signal-handler.js";
// Errors
export {
  ConfigurationError,
  CounterStoreError,
  errorMessage,
  LoadProbeError,
  SessionLifecycleError,
} from "./errors.js";
// HTTP
export type { LoadRunner } from "./http/load-test.js";
export type { LoadProbeServerOptions, RunDefaults } from "./http/server.js";
export { createLoadProbeServer } from "./http/server.js";
// Interfaces
export type { CircuitBreaker } from "./interfaces/circuit-breaker.js";
export type { ConcurrencyLimiter } from "./interfaces/concurrency-limiter.js";
export type { CounterNamespace, CounterStore, UrlCount } from "./interfaces/counter-store.js";
export { NAMESPACE_REAL, NAMESPACE_TEST } from "./interfaces/counter-store.js";
export type { HttpGetOptions, HttpSession } from "./interfaces/http-session.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
export type { ValidationResult } from "./server/request-validation.js";
export {
  validateApiPath,
  validatePagination,
  validateRequestCount,
} from "./server/request-validation.js";
// Types
export type {
  DispatcherConfig,
  DispatcherConfigInput,
  RunConfig,
  RunConfigInput,
} from "./types/config.js";
export {
  DEFAULT_RUN_SETTINGS,
  effectiveBatchSize,
  resolveDispatcherConfig,
  resolveRunConfig,
} from "./types/config.js";
export type { RequestOutcome, RunReport, RunResult, TaskResult, TokenPool } from "./types/run.js";
export { toRunReport } from "./types/run.js";
