// src/index.ts

export { NotifierApp } from './app';
export type { AppOverrides, AppHealth } from './app';
export { NotificationManager } from './core/manager/NotificationManager';
export type { NotificationManagerOptions } from './core/manager/NotificationManager';
export { PollingDriver } from './core/polling/PollingDriver';
export type { PollingDriverOptions, CycleReport, CycleStatus } from './core/polling/PollingDriver';
export { createNotification, notificationKey, isSameEvent } from './core/notification/Notification';
export type { Notification, NotificationInput, NotificationKey } from './core/notification/types';
export { SeenSet } from './core/seen/SeenSet';
export { SeenStateStore } from './core/seen/SeenStateStore';
export type { SeenStoreConfig } from './core/seen/types';
export { HttpCore } from './core/http/HttpCore';

// Providers
export type { NotificationProvider, FetchResult, ProviderDeps } from './providers/types';
export { BaseProvider } from './providers/BaseProvider';
export { GitHubProvider } from './providers/github/GitHubProvider';
export type { GitHubProviderConfig } from './providers/github/types';
export { RSSProvider } from './providers/rss/RSSProvider';
export type { RSSProviderConfig } from './providers/rss/types';

// Sinks
export type { NotificationSink, DeliveryResult } from './sinks/types';
export { LogSink } from './sinks/LogSink';
export { FanOutSink } from './sinks/FanOutSink';
export { ReceiptPrinter } from './sinks/printer/ReceiptPrinter';
export { ReceiptPrinterSink } from './sinks/printer/ReceiptPrinterSink';
export { renderReceipt, formatNotification } from './sinks/printer/ReceiptFormatter';

// Configuration
export { validateConfig, validateConfigSafe, AppConfigSchema } from './config/ConfigValidator';
export type { AppConfig } from './config/ConfigValidator';
export { loadConfigFromEnv, loadEnvFile } from './config/env';

export { Logger } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  NotifierError,
  ProviderError,
  ProviderNotConfiguredError,
  FetchFailedError,
  ProviderTimeoutError,
  MalformedItemError,
  DeliveryFailedError,
  DeliveryTimeoutError,
  ConfigError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  CircuitBreakerOpenError,
} from './utils/errors';
