import type { ServerResponse } from "node:http";
import { type CounterStore, NAMESPACE_TEST } from "../interfaces/counter-store.js";
import { validatePagination } from "../server/request-validation.js";
import { sendError, sendJson } from "./respond.js";

const DEFAULT_PAGE_SIZE = 100;

/** Synthetic-traffic counts, highest first. `page` is zero-based. */
export async function handleStats(
  res: ServerResponse,
  url: URL,
  store: CounterStore,
): Promise<void> {
  const pageParam = url.searchParams.get("page");
  const sizeParam = url.searchParams.get("page_size");

  let stats = await store.stats(NAMESPACE_TEST);

  if (pageParam !== null || sizeParam !== null) {
    const page = pageParam === null ? 0 : Number(pageParam);
    const pageSize = sizeParam === null ? DEFAULT_PAGE_SIZE : Number(sizeParam);
    const validation = validatePagination(page, pageSize);
    if (!validation.valid) {
      sendError(res, 400, validation.error);
      return;
    }
    stats = stats.slice(page * pageSize, (page + 1) * pageSize);
  }

  sendJson(res, 200, stats);
}
