// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';

export interface CircuitBreakerOptions {
  threshold?: number; // Consecutive failures before opening
  resetTimeout?: number; // ms the circuit stays open
}

export class CircuitBreaker {
  private failures: Map<string, number> = new Map();
  private lastFailureTime: Map<string, number> = new Map();
  private threshold: number;
  private resetTimeout: number;

  constructor(
    private logger: Logger,
    options: CircuitBreakerOptions = {}
  ) {
    this.threshold = options.threshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000;
  }

  canExecute(provider: string): boolean {
    const failures = this.failures.get(provider) ?? 0;
    const lastFailure = this.lastFailureTime.get(provider) ?? 0;

    if (failures >= this.threshold) {
      if (Date.now() - lastFailure < this.resetTimeout) {
        this.logger.warn('Circuit breaker open', { provider, failures });
        return false;
      }

      // Half-open: allow one attempt through
      this.failures.set(provider, 0);
    }

    return true;
  }

  recordSuccess(provider: string): void {
    this.failures.set(provider, 0);
  }

  recordFailure(provider: string): void {
    this.failures.set(provider, (this.failures.get(provider) ?? 0) + 1);
    this.lastFailureTime.set(provider, Date.now());
  }
}
