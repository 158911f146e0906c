#!/usr/bin/env node
import { MemoryCounterStore } from "../adapters/memory-counter-store.js";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { runLoad } from "../core/dispatcher.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { createLoadProbeServer } from "../http/server.js";
import { toRunReport } from "../types/run.js";
import { type CliCommand, parseCliArgs, USAGE } from "./cli-args.js";

function loggerFor(verbose: boolean): StructuredLogger {
  return new StructuredLogger({
    component: "loadprobe",
    level: verbose ? LogLevel.DEBUG : LogLevel.INFO,
  });
}

async function serve(command: Extract<CliCommand, { command: "serve" }>): Promise<void> {
  const logger = loggerFor(command.verbose);
  const store = new MemoryCounterStore();
  const server = createLoadProbeServer({ store, logger: logger.child("http") });

  await new Promise<void>((resolve, reject) => {
    server.once("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        console.error(`Error: Port ${command.port} is already in use.`);
        console.error(`Try a different port: loadprobe serve --port ${command.port + 1}`);
        process.exit(1);
      }
      reject(err);
    });
    server.listen(command.port, command.host, () => resolve());
  });

  const addr = server.address();
  logger.info("Counter service listening", {
    host: command.host,
    port: addr !== null && typeof addr === "object" ? addr.port : command.port,
  });

  registerSignalHandlers(
    () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
    { logger },
  );
}

async function run(command: Extract<CliCommand, { command: "run" }>): Promise<void> {
  const logger = loggerFor(command.verbose);
  const result = await runLoad(command.run, { logger: logger.child("dispatcher") });
  console.log(JSON.stringify(toRunReport(result), null, 2));
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}\nRun with --help for usage.`);
    process.exit(1);
  }

  switch (command.command) {
    case "help":
      console.log(USAGE);
      return;
    case "serve":
      await serve(command);
      return;
    case "run":
      await run(command);
      return;
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
