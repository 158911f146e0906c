/**
 * Logging contract shared by every loadprobe component.
 * StructuredLogger and NoopLogger implement it.
 * @module
 */

/** Fields attached to one log line. Error values are flattened by the logger. */
export type LogContext = Record<string, unknown>;

/** `debug` is optional so call sites use `logger.debug?.(...)`. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
