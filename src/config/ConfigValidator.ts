// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

// Seen Store Configuration Schema
const SeenStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Seen store backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
  })
  .refine((data) => data.backend === 'memory' || Boolean(data.url), {
    message: "Redis and Postgres backends require 'url' configuration",
  });

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

const CircuitBreakerConfigSchema = z.object({
  threshold: z.number().int().min(1).max(100).optional(),
  resetTimeout: z.number().int().positive().optional(),
});

const PollingConfigSchema = z.object({
  intervalMs: z.number().int().positive(),
  primeOnStart: z.boolean(),
  providerTimeoutMs: z.number().int().positive().optional(),
  deliveryTimeoutMs: z.number().int().positive().optional(),
  fetchConcurrency: z.number().int().min(1).max(16),
});

const GitHubConfigSchema = z.object({
  token: z.string().optional(),
  apiUrl: z.string().url().optional(),
  all: z.boolean().optional(),
  participating: z.boolean().optional(),
  perPage: z.number().int().min(1).max(50).optional(),
  maxPages: z.number().int().min(1).max(20).optional(),
});

const RSSConfigSchema = z.object({
  feeds: z.array(z.string().url()),
});

const SinkConfigSchema = z.object({
  type: z.enum(['printer', 'log', 'both'], {
    errorMap: () => ({ message: "Sink must be 'printer', 'log', or 'both'" }),
  }),
  printer: z.object({
    devicePath: z.string().min(1).optional(), // Unset: stdout
    width: z.number().int().min(16).max(80),
    useUtc: z.boolean().optional(),
  }),
});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

// Complete Application Configuration Schema
export const AppConfigSchema = z.object({
  polling: PollingConfigSchema,
  github: GitHubConfigSchema,
  rss: RSSConfigSchema,
  http: z.object({
    timeout: z.number().positive().optional(),
    retry: RetryConfigSchema,
    rateLimits: z.record(z.string(), RateLimitConfigSchema).optional(),
    circuitBreaker: CircuitBreakerConfigSchema.optional(),
  }),
  sink: SinkConfigSchema,
  seenStore: SeenStoreConfigSchema.optional(),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const formatIssues = (error: z.ZodError) =>
  error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);

/**
 * Validate application configuration
 *
 * @throws {ConfigError} Listing every invalid field as `path: message`
 */
export function validateConfig(config: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: AppConfig } | { success: false; errors: string[] } {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}
