import { z } from "zod";

const positiveInt = z.number().int().positive();
const positiveMs = z.number().int().positive();

export const dispatcherConfigSchema = z.object({
  baseUrl: z.string().url(),

  // Concurrency
  maxConcurrentRequests: positiveInt.default(50),

  // Circuit breaker
  failureThreshold: z.number().min(0).max(1).default(0.2),
  minSampleSize: positiveInt.default(20),
  // Outcomes recorded between breaker checks; falls back to minSampleSize
  batchSize: positiveInt.optional(),

  // Retry
  maxRetryAttempts: positiveInt.default(3),
  requestTimeoutMs: positiveMs.default(10_000),
  backoffBaseMs: z.number().int().min(0).default(1000),
  backoffCapMs: positiveMs.default(8000),
});

export const runConfigSchema = dispatcherConfigSchema.extend({
  totalRequests: positiveInt,
});
