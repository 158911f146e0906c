import type { Logger } from "../interfaces/logger.js";

/** Logger that discards everything; the default wherever none is injected. */
export class NoopLogger implements Logger {
  debug(_msg: string, _ctx?: Record<string, unknown>): void {}
  info(_msg: string, _ctx?: Record<string, unknown>): void {}
  warn(_msg: string, _ctx?: Record<string, unknown>): void {}
  error(_msg: string, _ctx?: Record<string, unknown>): void {}
}

export const noopLogger: Logger = new NoopLogger();
