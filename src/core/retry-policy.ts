/**
 * RetryPolicy: executes one logical synthetic request.
 *
 * Status classes: 2xx/3xx succeed, 4xx fail permanently, 5xx and transport
 * errors (connection failures, timeouts) are retried with capped exponential
 * backoff until the attempt budget is spent.
 *
 * @module
 */

import { errorMessage } from "../errors.js";
import { NAMESPACE_TEST } from "../interfaces/counter-store.js";
import type { HttpSession } from "../interfaces/http-session.js";
import type { Logger } from "../interfaces/logger.js";
import type { RequestOutcome } from "../types/run.js";
import { noopLogger } from "../utils/noop-logger.js";
import { type BackoffSchedule, retry, type Settled, type Sleep, type Verdict } from "./retry.js";

/** Marks requests as synthetic so the target can count them separately. */
export const SYNTHETIC_TRAFFIC_HEADER = "X-Request-Source";

export type StatusClass = "success" | "permanent" | "transient";

export function classifyStatus(status: number): StatusClass {
  if (status >= 500) return "transient";
  if (status >= 400) return "permanent";
  return "success";
}

type Accepted = { kind: "success" | "permanent_failure"; status: number };

function classifyAttempt(settled: Settled<number>): Verdict<Accepted> {
  if (!settled.ok) return { action: "retry", reason: errorMessage(settled.error) };

  const status = settled.value;
  switch (classifyStatus(status)) {
    case "success":
      return { action: "succeed", value: { kind: "success", status } };
    case "permanent":
      return { action: "fail", value: { kind: "permanent_failure", status } };
    case "transient":
      return { action: "retry", reason: `HTTP ${status}` };
  }
}

export interface RetryPolicyOptions {
  session: HttpSession;
  baseUrl: string;
  maxAttempts: number;
  timeoutMs: number;
  backoff: BackoffSchedule;
  sleep?: Sleep;
  logger?: Logger;
}

export class RetryPolicy {
  private readonly session: HttpSession;
  private readonly baseUrl: string;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly backoff: BackoffSchedule;
  private readonly sleep: Sleep | undefined;
  private readonly logger: Logger;

  constructor(options: RetryPolicyOptions) {
    this.session = options.session;
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.maxAttempts = options.maxAttempts;
    this.timeoutMs = options.timeoutMs;
    this.backoff = options.backoff;
    this.sleep = options.sleep;
    this.logger = options.logger ?? noopLogger;
  }

  async attempt(path: string, signal?: AbortSignal): Promise<RequestOutcome> {
    const url = `${this.baseUrl}${path}`;

    const result = await retry(
      () =>
        this.session.get(url, {
          headers: { [SYNTHETIC_TRAFFIC_HEADER]: NAMESPACE_TEST },
          timeoutMs: this.timeoutMs,
          signal,
        }),
      classifyAttempt,
      {
        maxAttempts: this.maxAttempts,
        backoff: this.backoff,
        sleep: this.sleep,
        signal,
        onRetry: ({ attempt, delayMs, reason }) => {
          this.logger.debug?.("Retrying request", { path, attempt, delayMs, reason });
        },
      },
    );

    switch (result.kind) {
      case "done":
        return { ...result.value, path, attempts: result.attempts };
      case "exhausted":
        return {
          kind: "transient_exhausted",
          path,
          reason: result.reason,
          attempts: result.attempts,
        };
      case "aborted":
        return { kind: "cancelled", path, attempts: result.attempts };
    }
  }
}
