/**
 * Pooled HTTP client owned by a dispatcher for the length of its scope.
 * @module
 */

export interface HttpGetOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpSession {
  /**
   * Issue a GET and resolve with the response status once the body is drained.
   * Rejects on connection errors, timeouts and aborts.
   */
  get(url: string, options: HttpGetOptions): Promise<number>;

  /** Release pooled connections. Safe to call more than once. */
  close(): Promise<void>;
}
