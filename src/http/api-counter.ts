import type { IncomingMessage, ServerResponse } from "node:http";
import { SYNTHETIC_TRAFFIC_HEADER } from "../core/retry-policy.js";
import { errorMessage } from "../errors.js";
import {
  type CounterNamespace,
  type CounterStore,
  NAMESPACE_REAL,
  NAMESPACE_TEST,
} from "../interfaces/counter-store.js";
import type { Logger } from "../interfaces/logger.js";
import { validateApiPath } from "../server/request-validation.js";
import { sendError } from "./respond.js";

/** `/api`, `/api/x` and `/api/x/` all count as `/api/…/` with a trailing slash. */
export function normalizeApiPath(pathname: string): string {
  return pathname.endsWith("/") ? pathname : `${pathname}/`;
}

export function namespaceFor(req: IncomingMessage): CounterNamespace {
  const source = req.headers[SYNTHETIC_TRAFFIC_HEADER.toLowerCase()];
  return source === NAMESPACE_TEST ? NAMESPACE_TEST : NAMESPACE_REAL;
}

/**
 * Count a hit on an `/api/*` path. Real traffic is answered even when the
 * store fails; synthetic traffic gets a 500 so the dispatcher sees the fault.
 */
export async function handleApiRequest(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  store: CounterStore,
  logger: Logger,
): Promise<void> {
  const path = normalizeApiPath(url.pathname);
  const validation = validateApiPath(path.slice("/api/".length));
  if (!validation.valid) {
    sendError(res, 400, validation.error);
    return;
  }

  const namespace = namespaceFor(req);
  try {
    await store.increment(path, namespace);
  } catch (err) {
    if (namespace === NAMESPACE_TEST) {
      sendError(res, 500, `Counter update failed: ${errorMessage(err)}`);
      return;
    }
    logger.warn("Counter update failed for real traffic", { path, error: err });
  }

  res.writeHead(200);
  res.end();
}
