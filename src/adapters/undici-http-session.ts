import { Agent, request } from "undici";
import { SessionLifecycleError } from "../errors.js";
import type { HttpGetOptions, HttpSession } from "../interfaces/http-session.js";

export interface UndiciHttpSessionOptions {
  /** Max sockets per origin. Defaults to unlimited. */
  connections?: number;
  keepAliveTimeoutMs?: number;
}

/**
 * HttpSession over an undici connection pool.
 * The per-request timeout bounds the total time of one attempt, including a
 * body that arrives slowly.
 */
export class UndiciHttpSession implements HttpSession {
  private readonly agent: Agent;
  private closed = false;

  constructor(options: UndiciHttpSessionOptions = {}) {
    this.agent = new Agent({
      connections: options.connections ?? null,
      keepAliveTimeout: options.keepAliveTimeoutMs ?? 4000,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async get(url: string, options: HttpGetOptions): Promise<number> {
    if (this.closed) {
      throw new SessionLifecycleError("HTTP session is closed");
    }

    // timeoutMs caps the whole attempt, headers and body together
    const deadline = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([deadline, options.signal]) : deadline;

    const { statusCode, body } = await request(url, {
      method: "GET",
      headers: options.headers,
      dispatcher: this.agent,
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      signal,
    });
    // Drain so the socket goes back to the pool. dump() settles quietly when the
    // signal destroys the body, so check it afterwards.
    await body.dump();
    signal.throwIfAborted();
    return statusCode;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.agent.close();
  }
}
