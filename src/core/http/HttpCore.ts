// src/core/http/HttpCore.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpConfig, HttpRequestConfig, HttpResponse, RateLimitConfig } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler } from './RetryHandler';
import { CircuitBreaker } from './CircuitBreaker';
import { ETagCache } from './ETagCache';
import {
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkTimeoutError,
  NetworkError,
  CircuitBreakerOpenError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const DEFAULT_USER_AGENT = 'notification-printer/1.0';
const METHOD = 'GET';

/**
 * Shared HTTP client for providers: rate limiting per provider, retries,
 * a circuit breaker and ETag conditional requests. Response bodies are
 * returned as `unknown`; providers validate them.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<string, PQueue> = new Map();
  private retryHandler: RetryHandler;
  private circuitBreaker: CircuitBreaker;
  private etagCache: ETagCache;
  private userAgent: string;

  constructor(
    config: HttpConfig,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.circuitBreaker = new CircuitBreaker(logger, config.circuitBreaker);
    this.retryHandler = new RetryHandler(config.retry, logger, this.circuitBreaker);
    this.etagCache = new ETagCache();

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.initializeRateLimiters(config.rateLimits ?? {});
  }

  async get(url: string, options: Omit<HttpRequestConfig, 'url'>): Promise<HttpResponse> {
    return this.request({ ...options, url });
  }

  private async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const { provider } = config;
    const requestId = this.generateRequestId();
    const method = METHOD;

    this.logger.debug('HTTP request', {
      requestId,
      provider,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    if (!this.circuitBreaker.canExecute(provider)) {
      throw new CircuitBreakerOpenError(`Circuit breaker open for ${provider}`, { provider });
    }

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.userAgent,
      'Accept-Encoding': 'gzip, deflate',
      ...config.headers,
    };

    // Conditional request when we hold an ETag for this resource
    const cachedData = config.etagKey ? this.etagCache.get(config.etagKey) : undefined;
    if (cachedData) {
      headers['If-None-Match'] = cachedData.etag;
      this.logger.debug('Conditional request', { requestId, etag: cachedData.etag });
    }

    const execute = async (): Promise<HttpResponse> =>
      withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.retryHandler.execute(
            () =>
              this.axiosInstance.request<unknown>({
                url: config.url,
                method,
                headers,
                params: config.query,
                timeout: config.timeout,
                responseType: config.responseType ?? 'json',
                validateStatus: (status) => status < 400,
              }),
            provider
          );

          this.circuitBreaker.recordSuccess(provider);
          this.metrics.incrementCounter('http_requests_total', {
            provider,
            method,
            status: axiosResponse.status,
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            provider,
            status: axiosResponse.status,
          });

          if (axiosResponse.status === 304 && cachedData) {
            this.logger.debug('304 Not Modified, using cache', { requestId });
            this.metrics.incrementCounter('http_cache_hits_total', { provider });
            return { ...cachedData.payload, status: 304, cached: true };
          }

          const result: HttpResponse = {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse),
          };

          const etag = result.headers.etag;
          if (config.etagKey && etag) {
            this.etagCache.set(config.etagKey, result, etag);
            this.logger.debug('Cached with ETag', { requestId, etag });
          }

          return result;
        } catch (error: unknown) {
          this.circuitBreaker.recordFailure(provider);

          const status = axios.isAxiosError(error) ? (error.response?.status ?? 'error') : 'error';
          this.metrics.incrementCounter('http_requests_total', { provider, method, status });
          this.metrics.incrementCounter('http_errors_total', { provider, status });

          throw this.transformError(error, provider);
        }
      });

    return this.runThroughRateLimiter(provider, execute);
  }

  private async runThroughRateLimiter<T>(provider: string, task: () => Promise<T>): Promise<T> {
    const queue = this.rateLimiters.get(provider);

    if (!queue) {
      return task();
    }

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { provider });

    return queue.add(async () => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { provider });
      }
    });
  }

  private initializeRateLimiters(rateLimits: Record<string, RateLimitConfig>): void {
    for (const [provider, config] of Object.entries(rateLimits)) {
      // Fractional QPS: one request per 1/qps seconds
      const intervalCap = config.qps >= 1 ? Math.floor(config.qps) : 1;
      const interval = config.qps >= 1 ? 1000 : Math.floor(1000 / config.qps);

      this.rateLimiters.set(
        provider,
        new PQueue({ intervalCap, interval, concurrency: config.concurrency })
      );

      this.logger.debug('Rate limiter initialized', {
        provider,
        qps: config.qps,
        intervalCap,
        interval,
        concurrency: config.concurrency,
      });
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(response: AxiosResponse): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, provider: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError(String(error), { provider });
    }

    const response = error.response;
    if (response) {
      const status = response.status;

      this.logger.debug('HTTP error response', {
        provider,
        status,
        statusText: response.statusText,
        data: response.data,
      });

      if (status === 429) {
        const retryAfter = Number(response.headers['retry-after']);
        return new RateLimitError(`Rate limited by ${provider}`, isNaN(retryAfter) ? undefined : retryAfter, {
          provider,
        });
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, {
          provider,
          response: response.data,
        });
      }
      return new ApiServerError(`Server error: ${status}`, status, { provider });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { provider });
    }
    return new NetworkError(`Network error: ${error.message}`, { provider, code: error.code });
  }
}
