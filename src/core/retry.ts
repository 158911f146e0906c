/**
 * Retry combinator.
 *
 * Runs an operation until a classifier accepts its result, the attempt budget
 * runs out, or the abort signal fires. Classification is a pure function of
 * the settled attempt, so the caller decides what counts as transient.
 *
 * @module
 */

import { setTimeout as delay } from "node:timers/promises";

/** One settled attempt, as seen by the classifier. */
export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

export type Verdict<T> =
  | { action: "succeed"; value: T }
  | { action: "fail"; value: T }
  | { action: "retry"; reason: string };

export type RetryResult<T> =
  | { kind: "done"; value: T; attempts: number }
  | { kind: "exhausted"; reason: string; attempts: number }
  | { kind: "aborted"; attempts: number };

/** Delay in ms before the retry that follows the zero-based `attemptIndex`. */
export type BackoffSchedule = (attemptIndex: number) => number;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  backoff: BackoffSchedule;
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; reason: string }) => void;
}

export function exponentialBackoff(options: { baseMs: number; capMs: number }): BackoffSchedule {
  return (attemptIndex) => Math.min(options.capMs, options.baseMs * 2 ** attemptIndex);
}

export const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export async function retry<R, T>(
  operation: (attempt: number) => Promise<R>,
  classify: (settled: Settled<R>) => Verdict<T>,
  options: RetryOptions,
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? abortableSleep;
  const { signal } = options;
  let reason = "no attempts made";

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    if (signal?.aborted) return { kind: "aborted", attempts: attempt - 1 };

    let settled: Settled<R>;
    try {
      settled = { ok: true, value: await operation(attempt) };
    } catch (error) {
      settled = { ok: false, error };
    }

    // An attempt interrupted by the signal is not classified
    if (signal?.aborted) return { kind: "aborted", attempts: attempt };

    const verdict = classify(settled);
    if (verdict.action !== "retry") {
      return { kind: "done", value: verdict.value, attempts: attempt };
    }

    reason = verdict.reason;
    if (attempt === options.maxAttempts) break;

    const delayMs = options.backoff(attempt - 1);
    options.onRetry?.({ attempt, delayMs, reason });
    try {
      await sleep(delayMs, signal);
    } catch (error) {
      if (signal?.aborted) return { kind: "aborted", attempts: attempt };
      throw error;
    }
  }

  return { kind: "exhausted", reason, attempts: options.maxAttempts };
}
