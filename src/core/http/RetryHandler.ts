// src/core/http/RetryHandler.ts

import axios from 'axios';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { CircuitBreaker } from './CircuitBreaker';

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private circuitBreaker?: CircuitBreaker
  ) {}

  async execute<T>(task: () => Promise<T>, provider: string): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      // Re-check the breaker before every retry, not just the first attempt
      if (attempt > 0 && this.circuitBreaker && !this.circuitBreaker.canExecute(provider)) {
        this.logger.warn('Circuit breaker open, skipping retry', { provider, attempt });
        throw lastError;
      }

      try {
        return await task();
      } catch (error: unknown) {
        lastError = error;

        const response = axios.isAxiosError(error) ? error.response : undefined;
        const status = response?.status;
        const isRetryable = status !== undefined && this.config.retryableStatusCodes.includes(status);

        if (!isRetryable || attempt === this.config.maxRetries) {
          throw error;
        }

        const retryAfter = response?.headers['retry-after'];
        const delay =
          retryAfter !== undefined && retryAfter !== null
            ? this.retryAfterDelay(String(retryAfter))
            : this.backoffDelay(attempt);

        this.logger.warn('Retrying request', {
          provider,
          attempt: attempt + 1,
          delay,
          status,
          retryAfter,
        });

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw lastError;
  }

  // Retry-After is either seconds or an HTTP date
  private retryAfterDelay(retryAfter: string): number {
    const seconds = parseInt(retryAfter, 10);
    const delay = isNaN(seconds)
      ? Math.max(0, new Date(retryAfter).getTime() - Date.now())
      : seconds * 1000;
    return Math.min(isNaN(delay) ? this.config.baseDelay : delay, this.config.maxDelay);
  }

  // Exponential backoff with jitter
  private backoffDelay(attempt: number): number {
    return Math.min(
      this.config.baseDelay * Math.pow(2, attempt) + Math.random() * 1000,
      this.config.maxDelay
    );
  }
}
