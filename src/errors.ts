export class LoadProbeError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LoadProbeError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Invalid run parameters. Raised before any request is sent. */
export class ConfigurationError extends LoadProbeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

/** The dispatcher was used outside its open/close scope. */
export class SessionLifecycleError extends LoadProbeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SESSION_LIFECYCLE", options);
    this.name = "SessionLifecycleError";
  }
}

export class CounterStoreError extends LoadProbeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "COUNTER_STORE", options);
    this.name = "CounterStoreError";
  }
}

// ── Utilities ──

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
