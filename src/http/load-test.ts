import type { ServerResponse } from "node:http";
import { ConfigurationError, errorMessage } from "../errors.js";
import { type CounterStore, NAMESPACE_TEST } from "../interfaces/counter-store.js";
import type { Logger } from "../interfaces/logger.js";
import { validateRequestCount } from "../server/request-validation.js";
import { type RunResult, toRunReport } from "../types/run.js";
import { sendError, sendJson } from "./respond.js";

/** Runs `requested` synthetic requests against `baseUrl`. */
export type LoadRunner = (requested: number, baseUrl: string) => Promise<RunResult>;

export interface LoadTestContext {
  store: CounterStore;
  runner: LoadRunner;
  /** Address of this server, used as the default target. */
  selfBaseUrl: string;
  logger: Logger;
}

/**
 * Start a fresh synthetic run: previous synthetic counts are discarded first,
 * then the run report is returned once the run resolves.
 */
export async function handleLoadTest(
  res: ServerResponse,
  requested: number,
  ctx: LoadTestContext,
): Promise<void> {
  const validation = validateRequestCount(requested);
  if (!validation.valid) {
    sendError(res, 400, validation.error);
    return;
  }

  try {
    await ctx.store.clearNamespace(NAMESPACE_TEST);
  } catch (err) {
    ctx.logger.warn("Could not clear previous synthetic counts", { error: err });
  }

  try {
    const result = await ctx.runner(requested, ctx.selfBaseUrl);
    sendJson(res, 200, toRunReport(result));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      sendError(res, 400, err.message);
      return;
    }
    ctx.logger.error("Load run failed", { requested, error: err });
    sendError(res, 500, errorMessage(err));
  }
}
