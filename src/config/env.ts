// src/config/env.ts

import dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { validateConfig, type AppConfig } from './ConfigValidator';

export const DEFAULT_ENV_FILE = path.join('config', '.env');

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

// Unparseable values are passed on as-is so validation reports them
function readNumber(env: Env, key: string): number | undefined {
  const value = env[key]?.trim();
  return value ? Number(value) : undefined;
}

function readBoolean(env: Env, key: string): boolean | string | undefined {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return undefined;
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  return value;
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readList(env: Env, key: string): string[] {
  return (env[key] ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Load a .env file into process.env. A missing file is not an error;
 * variables already set in the environment win.
 *
 * @returns True when the file existed and was loaded
 */
export function loadEnvFile(filePath: string = DEFAULT_ENV_FILE): boolean {
  if (!fs.existsSync(filePath)) {
    return false;
  }

  const result = dotenv.config({ path: filePath });
  if (result.error) {
    throw result.error;
  }
  return true;
}

/**
 * Build the raw configuration object from environment variables, with defaults
 */
export function buildConfigFromEnv(env: Env = process.env): Record<string, unknown> {
  const intervalSeconds = readNumber(env, 'POLL_INTERVAL_SECONDS') ?? 60;
  const metricsPort = readNumber(env, 'METRICS_PORT');
  const seenStoreBackend = readString(env, 'SEEN_STORE_BACKEND');

  return {
    polling: {
      intervalMs: intervalSeconds * 1000,
      primeOnStart: readBoolean(env, 'PRIME_ON_START') ?? true,
      providerTimeoutMs: readNumber(env, 'PROVIDER_TIMEOUT_MS'),
      deliveryTimeoutMs: readNumber(env, 'DELIVERY_TIMEOUT_MS'),
      fetchConcurrency: readNumber(env, 'FETCH_CONCURRENCY') ?? 1,
    },
    github: {
      token: readString(env, 'GITHUB_TOKEN'),
      apiUrl: readString(env, 'GITHUB_API_URL'),
      all: readBoolean(env, 'GITHUB_ALL'),
      participating: readBoolean(env, 'GITHUB_PARTICIPATING'),
      perPage: readNumber(env, 'GITHUB_PER_PAGE'),
      maxPages: readNumber(env, 'GITHUB_MAX_PAGES'),
    },
    rss: {
      feeds: readList(env, 'RSS_FEEDS'),
    },
    http: {
      timeout: readNumber(env, 'HTTP_TIMEOUT_MS') ?? 30000,
      retry: {
        maxRetries: readNumber(env, 'HTTP_MAX_RETRIES') ?? 3,
        baseDelay: 1000,
        maxDelay: 30000,
        retryableStatusCodes: [408, 429, 500, 502, 503, 504],
      },
      rateLimits: {
        GitHub: { qps: 5, concurrency: 2 },
        RSS: { qps: 2, concurrency: 2 },
      },
      circuitBreaker: {
        threshold: readNumber(env, 'HTTP_BREAKER_THRESHOLD') ?? 5,
        resetTimeout: readNumber(env, 'HTTP_BREAKER_RESET_MS') ?? 60000,
      },
    },
    sink: {
      type: readString(env, 'SINK') ?? 'printer',
      printer: {
        devicePath: readString(env, 'PRINTER_DEVICE'),
        width: readNumber(env, 'PRINTER_WIDTH') ?? 32,
        useUtc: readBoolean(env, 'PRINTER_UTC'),
      },
    },
    ...(seenStoreBackend && {
      seenStore: {
        backend: seenStoreBackend,
        url: readString(env, 'SEEN_STORE_URL'),
        namespace: readString(env, 'SEEN_STORE_NAMESPACE'),
      },
    }),
    metrics: {
      enabled: metricsPort !== undefined,
      port: metricsPort,
    },
    logging: {
      level: readString(env, 'LOG_LEVEL') ?? 'info',
      format: readString(env, 'LOG_FORMAT') ?? 'pretty',
    },
  };
}

/**
 * Validated configuration from the environment
 *
 * @throws {ConfigError} When any variable holds an invalid value
 */
export function loadConfigFromEnv(env: Env = process.env): AppConfig {
  return validateConfig(buildConfigFromEnv(env));
}
