/**
 * Outcome and report types shared by the dispatcher, breaker and HTTP layer.
 * @module
 */

/** Terminal result of one logical request (all of its attempts). */
export type RequestOutcome =
  | { kind: "success"; path: string; status: number; attempts: number }
  | { kind: "permanent_failure"; path: string; status: number; attempts: number }
  | { kind: "transient_exhausted"; path: string; reason: string; attempts: number }
  | { kind: "cancelled"; path: string; attempts: number };

/**
 * What a scheduled task settles to. `error` covers anything thrown outside the
 * request classification (a limiter or session fault), so a task never rejects.
 */
export type TaskResult = RequestOutcome | { kind: "error"; path: string; detail: string };

/** Three path segments drawn once per run. */
export type TokenPool = readonly [string, string, string];

export interface RunResult {
  successfulRequests: number;
  failedRequests: number;
  totalCompleted: number;
  totalCancelled: number;
  completionRate: number;
  failureRate: number;
  circuitBreakerTriggered: boolean;
  message: string;
  tokens: string[];
}

/** Flat snake_case record handed to reporting consumers. */
export interface RunReport {
  successful_requests: number;
  failed_requests: number;
  total_completed: number;
  total_cancelled: number;
  completion_rate: number;
  failure_rate: number;
  circuit_breaker_triggered: boolean;
  message: string;
  random_strings_used: string[];
}

export function toRunReport(result: RunResult): RunReport {
  return {
    successful_requests: result.successfulRequests,
    failed_requests: result.failedRequests,
    total_completed: result.totalCompleted,
    total_cancelled: result.totalCancelled,
    completion_rate: result.completionRate,
    failure_rate: result.failureRate,
    circuit_breaker_triggered: result.circuitBreakerTriggered,
    message: result.message,
    random_strings_used: [...result.tokens],
  };
}
