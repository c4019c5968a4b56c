// src/utils/errors.ts

export class NotifierError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Provider errors
export class ProviderError extends NotifierError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROVIDER_ERROR', details);
  }
}

export class ProviderNotConfiguredError extends ProviderError {
  constructor(provider: string, details?: Record<string, unknown>) {
    super(`Provider ${provider} is not configured`, { ...details, provider });
    this.code = 'NOT_CONFIGURED';
  }
}

export class FetchFailedError extends ProviderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'FETCH_FAILED';
  }
}

export class ProviderTimeoutError extends FetchFailedError {
  constructor(provider: string, timeoutMs: number) {
    super(`Provider ${provider} did not respond within ${timeoutMs}ms`, { provider, timeoutMs });
    this.code = 'PROVIDER_TIMEOUT';
  }
}

export class MalformedItemError extends ProviderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'MALFORMED_ITEM';
  }
}

// Sink errors
export class DeliveryFailedError extends NotifierError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DELIVERY_FAILED', details);
  }
}

export class DeliveryTimeoutError extends DeliveryFailedError {
  constructor(sink: string, timeoutMs: number) {
    super(`Sink ${sink} did not finish within ${timeoutMs}ms`, { sink, timeoutMs });
    this.code = 'DELIVERY_TIMEOUT';
  }
}

// Configuration errors
export class ConfigError extends NotifierError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message, 'CONFIG_INVALID', { issues });
  }
}

// API errors
export class ApiError extends NotifierError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends NotifierError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class CircuitBreakerOpenError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

/**
 * Message of an unknown thrown value, for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error code of an unknown thrown value ('unknown' when it carries none)
 */
export function errorCode(error: unknown): string {
  if (error instanceof NotifierError) return error.code;
  if (error instanceof Error && 'code' in error) {
    return String(error.code);
  }
  return 'unknown';
}
