// src/core/seen/SeenStateStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import { z } from 'zod';
import type { SeenStoreConfig } from './types';
import type { Logger } from '../../observability/Logger';
import { ConfigError } from '../../utils/errors';

const StoredIdsSchema = z.array(z.string());

/**
 * Persists seen ids per source so a restart does not reprint old items.
 * One key per source: `seen:<namespace>:<source>` → string[]
 */
export class SeenStateStore {
  private store: Keyv<string[]>;
  private namespace: string;

  constructor(
    config: SeenStoreConfig,
    private logger: Logger
  ) {
    this.namespace = config.namespace ?? 'default';

    if (config.backend !== 'memory' && !config.url) {
      throw new ConfigError(`Seen store backend '${config.backend}' requires a url`);
    }

    if (config.backend === 'redis' && config.url) {
      this.store = new Keyv<string[]>({ store: new KeyvRedis(config.url) });
    } else if (config.backend === 'postgres' && config.url) {
      this.store = new Keyv<string[]>({ store: new KeyvPostgres({ uri: config.url }) });
    } else {
      this.store = new Keyv<string[]>(); // Memory
    }

    this.store.on('error', (error: unknown) => {
      this.logger.error('Seen store connection error', {
        backend: config.backend,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async load(source: string): Promise<string[]> {
    const stored: unknown = await this.store.get(this.createKey(source));
    if (stored === undefined) return [];

    const parsed = StoredIdsSchema.safeParse(stored);
    if (!parsed.success) {
      this.logger.warn('Discarding unreadable seen state', { source, namespace: this.namespace });
      return [];
    }

    return parsed.data;
  }

  /**
   * Merge ids into the stored list for a source
   */
  async append(source: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    const existing = await this.load(source);
    const merged = Array.from(new Set([...existing, ...ids]));
    await this.store.set(this.createKey(source), merged);

    this.logger.debug('Seen state saved', { source, added: ids.length, total: merged.length });
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }

  private createKey(source: string): string {
    return `seen:${this.namespace}:${source}`;
  }
}
