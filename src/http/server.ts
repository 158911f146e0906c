import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { runLoad } from "../core/dispatcher.js";
import { errorMessage } from "../errors.js";
import { type CounterStore, NAMESPACE_TEST } from "../interfaces/counter-store.js";
import type { Logger } from "../interfaces/logger.js";
import type { RunConfigInput } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { handleApiRequest } from "./api-counter.js";
import { handleHealth } from "./health.js";
import { handleLoadTest, type LoadRunner } from "./load-test.js";
import { sendError } from "./respond.js";
import { handleStats } from "./stats.js";

/** Run settings applied to every `/test/<n>/` run; `baseUrl` defaults to this server. */
export type RunDefaults = Partial<Omit<RunConfigInput, "totalRequests">>;

export interface LoadProbeServerOptions {
  store: CounterStore;
  logger?: Logger;
  runDefaults?: RunDefaults;
  /** Replaces the built-in runner, which calls runLoad(). */
  loadRunner?: LoadRunner;
}

const TEST_ROUTE = /^\/test\/([^/]+)\/?$/;

function selfBaseUrl(server: Server): string {
  const addr = server.address();
  if (addr === null || typeof addr === "string") {
    return "http://127.0.0.1";
  }
  const host = addr.family === "IPv6" ? `[${addr.address}]` : addr.address;
  return `http://${host === "0.0.0.0" || host === "[::]" ? "127.0.0.1" : host}:${addr.port}`;
}

function methodNotAllowed(res: ServerResponse): void {
  sendError(res, 405, "Method Not Allowed");
}

export function createLoadProbeServer(options: LoadProbeServerOptions): Server {
  const { store } = options;
  const logger = options.logger ?? noopLogger;
  const runDefaults = options.runDefaults ?? {};

  const runner: LoadRunner =
    options.loadRunner ??
    ((requested, baseUrl) =>
      runLoad(
        { ...runDefaults, baseUrl: runDefaults.baseUrl ?? baseUrl, totalRequests: requested },
        {
          logger,
          onTrip: async () => {
            await store.clearNamespace(NAMESPACE_TEST);
          },
        },
      ));

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    if (url.pathname === "/api" || url.pathname.startsWith("/api/")) {
      if (method !== "GET") return methodNotAllowed(res);
      await handleApiRequest(req, res, url, store, logger);
      return;
    }

    if (url.pathname === "/stats" || url.pathname === "/stats/") {
      if (method !== "GET") return methodNotAllowed(res);
      await handleStats(res, url, store);
      return;
    }

    if (url.pathname === "/health") {
      if (method !== "GET") return methodNotAllowed(res);
      await handleHealth(res, store);
      return;
    }

    const testMatch = TEST_ROUTE.exec(url.pathname);
    if (testMatch && /^\d+$/.test(testMatch[1] ?? "")) {
      if (method !== "POST") return methodNotAllowed(res);
      await handleLoadTest(res, Number(testMatch[1]), {
        store,
        runner,
        selfBaseUrl: selfBaseUrl(server),
        logger,
      });
      return;
    }

    sendError(res, 404, "Not Found");
  }

  const server = createHttpServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      logger.error("Request handler failed", { path: req.url, error: err });
      if (!res.headersSent) {
        sendError(res, 500, errorMessage(err));
      } else {
        res.end();
      }
    });
  });

  return server;
}
