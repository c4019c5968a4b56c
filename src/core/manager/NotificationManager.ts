// src/core/manager/NotificationManager.ts

import PQueue from 'p-queue';
import type { Notification } from '../notification/types';
import type { FetchResult, NotificationProvider } from '../../providers/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { SeenStateStore } from '../seen/SeenStateStore';
import { SeenSet } from '../seen/SeenSet';
import { notificationKey } from '../notification/Notification';
import { withTimeout } from '../../utils/timeout';
import { withProviderSpan } from '../../observability/tracing';
import { FetchFailedError, ProviderTimeoutError, errorCode, errorMessage } from '../../utils/errors';

export interface NotificationManagerOptions {
  logger: Logger;
  metrics: MetricsCollector;
  providerTimeoutMs?: number; // Per-provider bound on one fetch (default: none)
  fetchConcurrency?: number; // Providers fetched at once (default: 1)
  seenStore?: SeenStateStore;
}

/**
 * Owns the provider registry and the seen-set, and computes the delta of
 * notifications not reported before. Neither retrieval method ever rejects:
 * provider failures become log lines and an empty contribution.
 */
export class NotificationManager {
  private providerList: NotificationProvider[] = [];
  private seen = new SeenSet();
  private warnedUnconfigured = new WeakSet<NotificationProvider>();
  private logger: Logger;
  private metrics: MetricsCollector;

  constructor(private options: NotificationManagerOptions) {
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  /**
   * Append a provider. No validation here; unconfigured providers are skipped at poll time.
   */
  addProvider(provider: NotificationProvider): void {
    this.providerList.push(provider);
    this.logger.info('Provider registered', {
      provider: provider.name,
      position: this.providerList.length,
    });
  }

  get providers(): readonly NotificationProvider[] {
    return this.providerList;
  }

  get seenCount(): number {
    return this.seen.size;
  }

  hasSeen(notification: Notification): boolean {
    return this.seen.has(notificationKey(notification));
  }

  /**
   * Everything the configured providers currently report, in registration
   * order then provider order. Leaves the seen-set untouched.
   */
  async getAllNotifications(): Promise<Notification[]> {
    const batches = await this.collect();
    return batches.flat();
  }

  /**
   * Notifications whose (source, id) has not been reported before. Every
   * returned item is recorded as seen; within one cycle the first occurrence
   * of a key wins.
   */
  async getNewNotifications(): Promise<Notification[]> {
    const batches = await this.collect();

    // Filter and insert in one synchronous pass, after every fetch has settled
    const fresh: Notification[] = [];
    for (const notification of batches.flat()) {
      if (this.seen.add(notificationKey(notification))) {
        fresh.push(notification);
        this.metrics.incrementCounter('notifications_new_total', { source: notification.source });
      }
    }

    this.metrics.recordGauge('seen_set_size', this.seen.size);
    await this.persist(fresh);

    return fresh;
  }

  /**
   * Record notifications as seen without reporting them (used to prime)
   *
   * @returns How many were not already seen
   */
  markAsSeen(notifications: readonly Notification[]): number {
    let added = 0;
    for (const notification of notifications) {
      if (this.seen.add(notificationKey(notification))) added++;
    }
    this.metrics.recordGauge('seen_set_size', this.seen.size);
    return added;
  }

  /**
   * Load persisted seen ids for every registered source
   *
   * @returns Number of entries added to the seen-set
   */
  async restoreSeenState(): Promise<number> {
    const store = this.options.seenStore;
    if (!store) return 0;

    let restored = 0;
    const sources = new Set(this.providerList.map((provider) => provider.name));

    for (const source of sources) {
      try {
        for (const id of await store.load(source)) {
          if (this.seen.add({ source, id })) restored++;
        }
      } catch (error: unknown) {
        this.logger.error('Failed to restore seen state', { source, error: errorMessage(error) });
      }
    }

    this.logger.info('Seen state restored', { sources: sources.size, entries: restored });
    this.metrics.recordGauge('seen_set_size', this.seen.size);
    return restored;
  }

  /**
   * One batch per registered provider, in registration order regardless of
   * which fetch finishes first. Skipped or failed providers yield [].
   */
  private async collect(): Promise<Notification[][]> {
    const queue = new PQueue({ concurrency: Math.max(1, this.options.fetchConcurrency ?? 1) });
    return Promise.all(this.providerList.map((provider) => queue.add(() => this.fetchFrom(provider))));
  }

  private async fetchFrom(provider: NotificationProvider): Promise<Notification[]> {
    if (!this.isConfigured(provider)) {
      if (!this.warnedUnconfigured.has(provider)) {
        this.warnedUnconfigured.add(provider);
        this.logger.warn('Provider not configured, skipping', { provider: provider.name });
      }
      this.metrics.incrementCounter('provider_fetch_total', { provider: provider.name, status: 'skipped' });
      return [];
    }

    const startTime = Date.now();
    const result = await withProviderSpan(provider.name, () => this.safeFetch(provider));
    this.metrics.recordLatency('provider_fetch_duration', Date.now() - startTime, {
      provider: provider.name,
    });

    if (!result.ok) {
      this.logger.error('Provider fetch failed, skipping for this cycle', {
        provider: provider.name,
        code: result.error.code,
        error: result.error.message,
      });
      this.metrics.incrementCounter('provider_fetch_total', { provider: provider.name, status: 'failed' });
      return [];
    }

    this.metrics.incrementCounter('provider_fetch_total', { provider: provider.name, status: 'success' });
    this.logger.debug('Provider fetched', {
      provider: provider.name,
      notifications: result.notifications.length,
      skipped: result.skipped,
    });
    return result.notifications;
  }

  private isConfigured(provider: NotificationProvider): boolean {
    try {
      return provider.isConfigured();
    } catch (error: unknown) {
      this.logger.error('Provider configuration check threw', {
        provider: provider.name,
        error: errorMessage(error),
      });
      return false;
    }
  }

  // Providers are expected to resolve with a result; a rejection or a hang is mapped to FetchFailed
  private async safeFetch(provider: NotificationProvider): Promise<FetchResult> {
    const timeoutMs = this.options.providerTimeoutMs;
    try {
      return await withTimeout(
        provider.fetchNotifications(),
        timeoutMs,
        () => new ProviderTimeoutError(provider.name, timeoutMs ?? 0)
      );
    } catch (error: unknown) {
      if (error instanceof FetchFailedError) {
        return { ok: false, error };
      }
      return {
        ok: false,
        error: new FetchFailedError(`Provider ${provider.name} threw: ${errorMessage(error)}`, {
          provider: provider.name,
          cause: errorCode(error),
        }),
      };
    }
  }

  private async persist(fresh: Notification[]): Promise<void> {
    const store = this.options.seenStore;
    if (!store || fresh.length === 0) return;

    const idsBySource = new Map<string, string[]>();
    for (const notification of fresh) {
      const ids = idsBySource.get(notification.source) ?? [];
      ids.push(notification.id);
      idsBySource.set(notification.source, ids);
    }

    for (const [source, ids] of idsBySource) {
      try {
        await store.append(source, ids);
      } catch (error: unknown) {
        this.logger.error('Failed to persist seen state', { source, error: errorMessage(error) });
      }
    }
  }
}
