import Parser from 'rss-parser';
import { z } from 'zod';
import crypto from 'crypto';
import { BaseProvider } from '../BaseProvider';
import type { ProviderDeps } from '../types';
import { FeedItemSchema, type RSSProviderConfig } from './types';
import type { Notification } from '../../core/notification/types';
import { createNotification } from '../../core/notification/Notification';
import { FetchFailedError, MalformedItemError, errorMessage } from '../../utils/errors';

export const FEED_ITEM_TYPE = 'Feed Item';

/**
 * RSS/Atom feeds as a notification source (no credentials required)
 *
 * Each configured feed is fetched with ETag caching and parsed with
 * rss-parser. A feed that fails is logged and skipped; the fetch only fails
 * when every feed fails.
 *
 * @example
 * ```typescript
 * manager.addProvider(new RSSProvider(deps, {
 *   feeds: ['https://example.com/feed.xml'],
 * }));
 * ```
 */
export class RSSProvider extends BaseProvider {
  readonly name: string;
  private parser: Parser;

  constructor(
    deps: ProviderDeps,
    private config: RSSProviderConfig
  ) {
    super(deps);
    this.name = config.name ?? 'RSS';
    this.parser = new Parser();
  }

  isConfigured(): boolean {
    return this.config.feeds.some((feed) => feed.trim() !== '');
  }

  protected async fetchRaw(): Promise<unknown[]> {
    const feeds = this.config.feeds.filter((feed) => feed.trim() !== '');
    const items: unknown[] = [];
    let failures = 0;

    for (const feedUrl of feeds) {
      try {
        items.push(...(await this.fetchFeed(feedUrl)));
      } catch (error: unknown) {
        failures++;
        this.deps.logger.warn('RSS feed failed', {
          provider: this.name,
          feedUrl,
          error: errorMessage(error),
        });
      }
    }

    if (failures > 0 && failures === feeds.length) {
      throw new FetchFailedError(`All ${failures} RSS feed(s) failed`, { provider: this.name });
    }

    return items;
  }

  protected toNotification(raw: unknown): Notification {
    const parsed = FeedItemSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedItemError('Unreadable feed item', { source: this.name });
    }

    const item = parsed.data;
    const id = item.guid || item.id || item.link;
    if (!id) {
      throw new MalformedItemError('Feed item has neither guid nor link', {
        source: this.name,
        feedUrl: item.feedUrl,
      });
    }

    return createNotification({
      id,
      title: item.title,
      source: this.name,
      type: FEED_ITEM_TYPE,
      timestamp: this.parseDate(item.isoDate ?? item.pubDate),
      repository: item.feedTitle,
      url: item.link,
      rawData: item,
    });
  }

  private async fetchFeed(feedUrl: string): Promise<unknown[]> {
    const response = await this.deps.http.get(feedUrl, {
      provider: this.name,
      headers: {
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml',
      },
      responseType: 'text',
      etagKey: { provider: this.name, resource: this.hashFeedUrl(feedUrl) },
    });

    const body = z.string().safeParse(response.data);
    if (!body.success) {
      throw new FetchFailedError('Feed response is not text', { provider: this.name, feedUrl });
    }

    const feed = await this.parser.parseString(body.data);
    const limit = this.config.limit ?? 50;

    return feed.items.slice(0, limit).map((item) => ({
      ...item,
      feedTitle: feed.title,
      feedUrl,
    }));
  }

  private parseDate(value: string | null | undefined): Date {
    if (!value) return this.now();
    const parsed = new Date(value);
    return isNaN(parsed.getTime()) ? this.now() : parsed;
  }

  // Short stable cache key per feed URL
  private hashFeedUrl(url: string): string {
    return crypto.createHash('sha256').update(url).digest('hex').substring(0, 16);
  }
}
