// src/app.ts

import type { Writable } from 'stream';
import type { NotificationProvider, ProviderDeps } from './providers/types';
import type { DeliveryResult, NotificationSink } from './sinks/types';
import { HttpCore } from './core/http/HttpCore';
import { NotificationManager } from './core/manager/NotificationManager';
import { PollingDriver, type CycleReport } from './core/polling/PollingDriver';
import { SeenStateStore } from './core/seen/SeenStateStore';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { GitHubProvider } from './providers/github/GitHubProvider';
import { RSSProvider } from './providers/rss/RSSProvider';
import { LogSink } from './sinks/LogSink';
import { FanOutSink } from './sinks/FanOutSink';
import { ReceiptPrinter } from './sinks/printer/ReceiptPrinter';
import { ReceiptPrinterSink } from './sinks/printer/ReceiptPrinterSink';
import { validateConfig, type AppConfig } from './config/ConfigValidator';

export interface AppOverrides {
  logger?: Logger;
  providers?: NotificationProvider[]; // Replaces the providers built from config
  sink?: NotificationSink; // Replaces the sink built from config
  printerStream?: Writable; // Printer output instead of the device or stdout
  now?: () => Date;
}

export interface AppHealth {
  running: boolean;
  seenCount: number;
  sink: string;
  providers: Array<{ name: string; configured: boolean }>;
}

interface AppCore {
  logger: Logger;
  metrics: MetricsCollector;
  http: HttpCore;
  seenStore?: SeenStateStore;
  manager: NotificationManager;
  sink: NotificationSink;
  driver: PollingDriver;
}

export class NotifierApp {
  private core: AppCore;

  private constructor(config: AppConfig, overrides: AppOverrides) {
    // Build dependencies first, then wire the manager and driver
    const logger = overrides.logger ?? new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const http = new HttpCore(
      {
        timeout: config.http.timeout,
        retry: config.http.retry,
        rateLimits: config.http.rateLimits,
        circuitBreaker: config.http.circuitBreaker,
      },
      metrics,
      logger
    );
    const seenStore = config.seenStore ? new SeenStateStore(config.seenStore, logger) : undefined;

    const manager = new NotificationManager({
      logger,
      metrics,
      providerTimeoutMs: config.polling.providerTimeoutMs,
      fetchConcurrency: config.polling.fetchConcurrency,
      seenStore,
    });

    const sink = overrides.sink ?? NotifierApp.buildSink(config, logger, overrides);
    const driver = new PollingDriver({
      manager,
      sink,
      logger,
      metrics,
      intervalMs: config.polling.intervalMs,
      deliveryTimeoutMs: config.polling.deliveryTimeoutMs,
      primeOnStart: config.polling.primeOnStart,
    });

    this.core = { logger, metrics, http, seenStore, manager, sink, driver };

    const providers = overrides.providers ?? this.buildDefaultProviders(config, overrides.now);
    for (const provider of providers) {
      manager.addProvider(provider);
    }
  }

  /**
   * Validate configuration, wire every component and restore persisted seen state
   *
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const app = await NotifierApp.init(loadConfigFromEnv());
   * await app.start();
   * process.on('SIGINT', () => void app.stop());
   * ```
   */
  static async init(config: AppConfig, overrides: AppOverrides = {}): Promise<NotifierApp> {
    const validatedConfig = validateConfig(config);
    const app = new NotifierApp(validatedConfig, overrides);

    await app.core.manager.restoreSeenState();

    app.core.logger.info('Notifier initialized', {
      providers: app.core.manager.providers.map((provider) => provider.name),
      sink: app.core.sink.name,
    });

    return app;
  }

  get manager(): NotificationManager {
    return this.core.manager;
  }

  get metrics(): MetricsCollector {
    return this.core.metrics;
  }

  /**
   * Register an additional provider; it takes part from the next cycle on
   */
  registerProvider(provider: NotificationProvider): void {
    this.core.manager.addProvider(provider);
  }

  /**
   * Prime (if configured) and begin polling
   */
  async start(): Promise<void> {
    await this.core.driver.start();
  }

  /**
   * Stop polling, wait for the cycle in progress and release connections
   */
  async stop(): Promise<void> {
    await this.core.driver.stop();
    await this.core.seenStore?.disconnect();
    await this.core.metrics.close();
  }

  /**
   * Run a single poll cycle
   */
  async pollOnce(): Promise<CycleReport> {
    return this.core.driver.runCycle();
  }

  /**
   * Deliver everything currently listed, without touching the seen-set
   */
  async printAll(): Promise<DeliveryResult> {
    const notifications = await this.core.manager.getAllNotifications();
    this.core.logger.info('Printing all notifications', { count: notifications.length });
    return this.core.sink.deliver(notifications);
  }

  getHealth(): AppHealth {
    return {
      running: this.core.driver.isRunning,
      seenCount: this.core.manager.seenCount,
      sink: this.core.sink.name,
      providers: this.core.manager.providers.map((provider) => ({
        name: provider.name,
        configured: provider.isConfigured(),
      })),
    };
  }

  private buildDefaultProviders(config: AppConfig, now?: () => Date): NotificationProvider[] {
    const deps: ProviderDeps = {
      http: this.core.http,
      logger: this.core.logger,
      metrics: this.core.metrics,
      now,
    };

    const providers: NotificationProvider[] = [new GitHubProvider(deps, config.github)];
    if (config.rss.feeds.length > 0) {
      providers.push(new RSSProvider(deps, { feeds: config.rss.feeds }));
    }
    return providers;
  }

  private static buildSink(config: AppConfig, logger: Logger, overrides: AppOverrides): NotificationSink {
    const { devicePath, width, useUtc } = config.sink.printer;

    const createPrinter = () => {
      if (overrides.printerStream) {
        return new ReceiptPrinter({ stream: overrides.printerStream });
      }
      return devicePath ? new ReceiptPrinter({ devicePath }) : new ReceiptPrinter({ stream: process.stdout });
    };

    const printer = new ReceiptPrinterSink(createPrinter, logger, { width, useUtc, now: overrides.now });

    switch (config.sink.type) {
      case 'log':
        return new LogSink(logger);
      case 'both':
        return new FanOutSink([printer, new LogSink(logger)], logger);
      default:
        return printer;
    }
  }
}
