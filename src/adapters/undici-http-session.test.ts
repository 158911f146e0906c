import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { SessionLifecycleError } from "../errors.js";
import { UndiciHttpSession } from "./undici-http-session.js";

type Handler = (req: IncomingMessage, res: ServerResponse) => void;

function getBaseUrl(server: Server): string {
  const addr = server.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Expected AddressInfo");
  }
  return `http://127.0.0.1:${addr.port}`;
}

describe("UndiciHttpSession", () => {
  let server: Server | undefined;
  let session: UndiciHttpSession | undefined;

  afterEach(async () => {
    await session?.close();
    session = undefined;
    if (server?.listening) {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server?.close(() => resolve()));
    }
    server = undefined;
  });

  async function startServer(handler: Handler): Promise<string> {
    server = createServer(handler);
    await new Promise<void>((resolve) => server?.listen(0, "127.0.0.1", resolve));
    return getBaseUrl(server);
  }

  it.each([200, 302, 404, 503])("resolves with status %i", async (status) => {
    const base = await startServer((_req, res) => {
      res.writeHead(status);
      res.end("body");
    });
    session = new UndiciHttpSession();

    await expect(session.get(`${base}/api/x/`, { headers: {}, timeoutMs: 1000 })).resolves.toBe(
      status,
    );
  });

  it("sends the supplied headers", async () => {
    let seen: string | string[] | undefined;
    const base = await startServer((req, res) => {
      seen = req.headers["x-request-source"];
      res.end();
    });
    session = new UndiciHttpSession({ connections: 4 });

    await session.get(`${base}/api/`, {
      headers: { "X-Request-Source": "test" },
      timeoutMs: 1000,
    });

    expect(seen).toBe("test");
  });

  it("rejects when the server does not answer in time", async () => {
    const base = await startServer(() => {
      // never responds
    });
    session = new UndiciHttpSession();

    await expect(session.get(`${base}/api/slow/`, { headers: {}, timeoutMs: 50 })).rejects.toThrow();
  });

  it("rejects when the body trickles in past the timeout", async () => {
    const base = await startServer((_req, res) => {
      res.writeHead(200);
      let sent = 0;
      const timer = setInterval(() => {
        res.write("x");
        if (++sent === 15) {
          clearInterval(timer);
          res.end();
        }
      }, 100);
      res.on("close", () => clearInterval(timer));
    });
    session = new UndiciHttpSession();

    const started = Date.now();
    await expect(
      session.get(`${base}/api/drip/`, { headers: {}, timeoutMs: 300 }),
    ).rejects.toThrow();
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("applies the timeout alongside a caller signal", async () => {
    const base = await startServer(() => {
      // never responds
    });
    session = new UndiciHttpSession();
    const controller = new AbortController();

    await expect(
      session.get(`${base}/api/both/`, { headers: {}, timeoutMs: 50, signal: controller.signal }),
    ).rejects.toThrow();
    expect(controller.signal.aborted).toBe(false);
  });

  it("rejects when the signal aborts", async () => {
    const base = await startServer(() => {
      // never responds
    });
    session = new UndiciHttpSession();
    const controller = new AbortController();

    const pending = session.get(`${base}/api/hang/`, {
      headers: {},
      timeoutMs: 10_000,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toThrow();
  });

  it("rejects on connection refused", async () => {
    const base = await startServer((_req, res) => res.end());
    server?.close();
    await new Promise((r) => setTimeout(r, 10));
    session = new UndiciHttpSession();

    await expect(session.get(`${base}/api/`, { headers: {}, timeoutMs: 1000 })).rejects.toThrow();
  });

  it("refuses requests after close", async () => {
    session = new UndiciHttpSession();
    await session.close();
    expect(session.isClosed).toBe(true);

    await expect(
      session.get("http://127.0.0.1:1/api/", { headers: {}, timeoutMs: 1000 }),
    ).rejects.toBeInstanceOf(SessionLifecycleError);
  });

  it("close is idempotent", async () => {
    session = new UndiciHttpSession();
    await session.close();
    await expect(session.close()).resolves.toBeUndefined();
  });
});
