import type { z } from "zod";
import { dispatcherConfigSchema, runConfigSchema } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";

/** Dispatcher settings as callers write them; omitted fields take defaults. */
export type DispatcherConfigInput = z.input<typeof dispatcherConfigSchema>;
/** Fully resolved dispatcher settings. */
export type DispatcherConfig = z.output<typeof dispatcherConfigSchema>;

export type RunConfigInput = z.input<typeof runConfigSchema>;
/** Immutable settings for one run. */
export type RunConfig = Readonly<z.output<typeof runConfigSchema>>;

/** Every default the schema applies, read from the schema itself. */
export const DEFAULT_RUN_SETTINGS: Readonly<Omit<DispatcherConfig, "baseUrl">> = Object.freeze(
  dispatcherConfigSchema.omit({ baseUrl: true }).parse({}),
);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function resolveDispatcherConfig(input: DispatcherConfigInput): Readonly<DispatcherConfig> {
  const validation = dispatcherConfigSchema.safeParse(input);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(validation.error)}`, {
      cause: validation.error,
    });
  }
  return Object.freeze(validation.data);
}

export function resolveRunConfig(input: RunConfigInput): RunConfig {
  const validation = runConfigSchema.safeParse(input);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(validation.error)}`, {
      cause: validation.error,
    });
  }
  return Object.freeze(validation.data);
}

/** Outcomes per breaker evaluation window. */
export function effectiveBatchSize(config: Pick<DispatcherConfig, "batchSize" | "minSampleSize">): number {
  return config.batchSize ?? config.minSampleSize;
}
