import type { EventEmitter } from "node:events";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const SIGNALS = ["SIGTERM", "SIGINT"] as const;

export interface SignalHandlerOptions {
  logger?: Logger;
  timeoutMs?: number;
  /** Where signals are observed. Defaults to `process`. */
  source?: Pick<EventEmitter, "on">;
  exit?: (code: number) => void;
}

/**
 * Register SIGTERM and SIGINT handlers that run a cleanup function before exiting.
 * Force-exits with code 1 after `timeoutMs` if cleanup stalls.
 */
export function registerSignalHandlers(
  cleanup: () => Promise<void>,
  options: SignalHandlerOptions = {},
): void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const source = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handlerFor = (signal: string) => () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out", { timeoutMs });
      exit(1);
    }, timeoutMs);
    forceTimer.unref();

    cleanup()
      .catch((err: unknown) => {
        logger.error("Shutdown cleanup failed", { error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        exit(0);
      });
  };

  for (const signal of SIGNALS) {
    source.on(signal, handlerFor(signal));
  }
}
