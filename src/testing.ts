/**
 * Public test utilities, exported from the `"loadprobe/testing"` entry point.
 */
export { MemoryCounterStore } from "./adapters/memory-counter-store.js";
export type { FakeRequest, FakeResponse } from "./testing/fake-http-session.js";
export { FakeHttpSession } from "./testing/fake-http-session.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
