import { ConfigurationError } from "../errors.js";
import { DEFAULT_RUN_SETTINGS, type RunConfigInput } from "../types/config.js";

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = "127.0.0.1";

export type CliCommand =
  | { command: "help" }
  | { command: "serve"; port: number; host: string; verbose: boolean }
  | { command: "run"; run: RunConfigInput; verbose: boolean };

type RunOverrides = Omit<RunConfigInput, "baseUrl" | "totalRequests">;

export const USAGE = `
  loadprobe: synthetic HTTP load with a failure-rate circuit breaker

  Usage:
    loadprobe serve [options]     Start the counter service
    loadprobe run --url <base> --requests <n> [options]

  Serve options:
    --port <n>             Listen port (default: ${DEFAULT_PORT})
    --host <addr>          Listen address (default: ${DEFAULT_HOST})

  Run options:
    --url <base>           Target base URL; paths go under <base>/api/
    --requests <n>         Number of logical requests
    --concurrency <n>      Max requests in flight (default: ${DEFAULT_RUN_SETTINGS.maxConcurrentRequests})
    --threshold <f>        Failure rate that trips the breaker (default: ${DEFAULT_RUN_SETTINGS.failureThreshold})
    --min-sample <n>       Completions before the breaker may trip (default: ${DEFAULT_RUN_SETTINGS.minSampleSize})
    --batch-size <n>       Completions consumed per breaker check (default: min-sample)
    --retries <n>          Attempts per request, including the first (default: ${DEFAULT_RUN_SETTINGS.maxRetryAttempts})
    --timeout-ms <n>       Per-attempt timeout (default: ${DEFAULT_RUN_SETTINGS.requestTimeoutMs})
    --backoff-ms <n>       Base retry delay, doubled per retry up to ${DEFAULT_RUN_SETTINGS.backoffCapMs} (default: ${DEFAULT_RUN_SETTINGS.backoffBaseMs})

  Common:
    --verbose, -v          Debug logging
    --help, -h             Show this help
`;

function takeValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

function takeNumber(args: readonly string[], index: number, flag: string): number {
  const raw = takeValue(args, index, flag);
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new ConfigurationError(`${flag} requires a number`);
  }
  return value;
}

function parseServe(args: readonly string[]): CliCommand {
  let port = DEFAULT_PORT;
  let host = DEFAULT_HOST;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--port":
        port = takeNumber(args, ++i, arg);
        if (!Number.isInteger(port) || port < 0 || port > 65_535) {
          throw new ConfigurationError("--port must be an integer between 0 and 65535");
        }
        break;
      case "--host":
        host = takeValue(args, ++i, arg);
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        return { command: "help" };
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return { command: "serve", port, host, verbose };
}

function parseRun(args: readonly string[]): CliCommand {
  let baseUrl: string | undefined;
  let totalRequests: number | undefined;
  let verbose = false;
  const overrides: RunOverrides = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--url":
        baseUrl = takeValue(args, ++i, arg);
        break;
      case "--requests":
        totalRequests = takeNumber(args, ++i, arg);
        break;
      case "--concurrency":
        overrides.maxConcurrentRequests = takeNumber(args, ++i, arg);
        break;
      case "--threshold":
        overrides.failureThreshold = takeNumber(args, ++i, arg);
        break;
      case "--min-sample":
        overrides.minSampleSize = takeNumber(args, ++i, arg);
        break;
      case "--batch-size":
        overrides.batchSize = takeNumber(args, ++i, arg);
        break;
      case "--retries":
        overrides.maxRetryAttempts = takeNumber(args, ++i, arg);
        break;
      case "--timeout-ms":
        overrides.requestTimeoutMs = takeNumber(args, ++i, arg);
        break;
      case "--backoff-ms":
        overrides.backoffBaseMs = takeNumber(args, ++i, arg);
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        return { command: "help" };
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  if (baseUrl === undefined) throw new ConfigurationError("--url is required");
  if (totalRequests === undefined) throw new ConfigurationError("--requests is required");

  return { command: "run", run: { ...overrides, baseUrl, totalRequests }, verbose };
}

/** Parse the arguments after the script name. Range checks on run settings are left to the config schema. */
export function parseCliArgs(args: readonly string[]): CliCommand {
  const [command, ...rest] = args;
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { command: "help" };
    case "serve":
      return parseServe(rest);
    case "run":
      return parseRun(rest);
    default:
      throw new ConfigurationError(`Unknown command: ${command}`);
  }
}
