import type { ServerResponse } from "node:http";
import { errorMessage } from "../errors.js";
import type { CounterStore } from "../interfaces/counter-store.js";
import { sendJson } from "./respond.js";

export async function handleHealth(res: ServerResponse, store: CounterStore): Promise<void> {
  const timestamp = new Date().toISOString();
  try {
    await store.ping();
    sendJson(res, 200, { status: "healthy", store: "connected", timestamp });
  } catch (err) {
    sendJson(res, 500, {
      status: "unhealthy",
      store: "disconnected",
      error: errorMessage(err),
      timestamp,
    });
  }
}
