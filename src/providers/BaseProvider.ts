// src/providers/BaseProvider.ts

import type { FetchResult, NotificationProvider, ProviderDeps } from './types';
import type { Notification } from '../core/notification/types';
import {
  FetchFailedError,
  ProviderNotConfiguredError,
  errorCode,
  errorMessage,
} from '../utils/errors';

/**
 * Fetch → normalize-each → skip-malformed pipeline shared by the bundled
 * providers. Subclasses only talk to their API and map one raw item.
 */
export abstract class BaseProvider implements NotificationProvider {
  abstract readonly name: string;

  constructor(protected deps: ProviderDeps) {}

  abstract isConfigured(): boolean;

  /**
   * Retrieve the raw items; may throw on transport or API errors
   */
  protected abstract fetchRaw(): Promise<unknown[]>;

  /**
   * Map one raw item; throws MalformedItemError when it cannot be used
   */
  protected abstract toNotification(raw: unknown): Notification;

  async fetchNotifications(): Promise<FetchResult> {
    if (!this.isConfigured()) {
      return { ok: false, error: new ProviderNotConfiguredError(this.name) };
    }

    let rawItems: unknown[];
    try {
      rawItems = await this.fetchRaw();
    } catch (error: unknown) {
      this.deps.logger.error('Provider fetch failed', {
        provider: this.name,
        code: errorCode(error),
        error: errorMessage(error),
      });
      return {
        ok: false,
        error: new FetchFailedError(`Failed to fetch from ${this.name}: ${errorMessage(error)}`, {
          provider: this.name,
          cause: errorCode(error),
        }),
      };
    }

    return this.normalizeBatch(rawItems);
  }

  protected now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private normalizeBatch(rawItems: unknown[]): FetchResult {
    const notifications: Notification[] = [];
    let skipped = 0;

    for (const [index, raw] of rawItems.entries()) {
      try {
        notifications.push(this.toNotification(raw));
      } catch (error: unknown) {
        skipped++;
        this.deps.metrics.incrementCounter('malformed_items_total', { provider: this.name });
        this.deps.logger.warn('Skipping malformed item', {
          provider: this.name,
          index,
          code: errorCode(error),
          error: errorMessage(error),
        });
      }
    }

    this.deps.logger.debug('Provider fetch completed', {
      provider: this.name,
      received: rawItems.length,
      notifications: notifications.length,
      skipped,
    });

    return { ok: true, notifications, skipped };
  }
}
