// src/core/http/types.ts

import type { CircuitBreakerOptions } from './CircuitBreaker';

export interface HttpRequestConfig {
  url: string;
  provider: string; // Rate limiter, circuit breaker and metrics key
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  timeout?: number;
  responseType?: 'json' | 'text';
  etagKey?: ETagKey;
}

export interface ETagKey {
  provider: string;
  resource: string;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
  cached?: boolean; // True if returned from ETag cache
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  retryableStatusCodes: number[];
}

export interface HttpConfig {
  timeout?: number;
  userAgent?: string;
  retry: RetryConfig;
  rateLimits?: Record<string, RateLimitConfig>;
  circuitBreaker?: CircuitBreakerOptions;
}
