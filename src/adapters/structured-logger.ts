import { LoadProbeError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/** Flatten an Error into `key`, `keyStack` and, where present, `keyCode` / `keyCause`. */
function expandError(entry: Record<string, unknown>, key: string, err: Error): void {
  entry[key] = err.message;
  entry[`${key}Stack`] = err.stack;
  if (err instanceof LoadProbeError) entry[`${key}Code`] = err.code;
  if (err.cause instanceof Error) entry[`${key}Cause`] = err.cause.message;
}

function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * JSON-lines logger. One object per call, written to stderr unless a writer
 * is given. Child loggers share the sink and level; their component is the
 * parent's with `.<name>` appended.
 */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  readonly component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
  }

  child(name: string): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component: this.component ? `${this.component}.${name}` : name,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, msg, ctx);
  }

  private write(level: LogLevel, msg: string, ctx: Record<string, unknown> = {}): void {
    if (!this.isEnabled(level)) return;

    const time = new Date().toISOString();
    const entry: Record<string, unknown> = { time, level: LEVEL_NAMES[level], msg };
    if (this.component) entry.component = this.component;

    for (const [key, value] of Object.entries(ctx)) {
      if (RESERVED_KEYS.has(key)) continue;
      if (value instanceof Error) expandError(entry, key, value);
      else entry[key] = value;
    }

    let line: string;
    try {
      line = JSON.stringify(entry, replacer);
    } catch {
      // circular ctx
      line = JSON.stringify({ time, level: entry.level, msg, serializationError: true });
    }
    this.writer(line);
  }
}
