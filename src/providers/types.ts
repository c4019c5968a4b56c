// src/providers/types.ts

import type { Notification } from '../core/notification/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { ProviderError } from '../utils/errors';

export type FetchResult =
  | { ok: true; notifications: Notification[]; skipped: number }
  | { ok: false; error: ProviderError };

/**
 * One external notification source
 */
export interface NotificationProvider {
  /** Stable source name: dedup namespace and display name */
  readonly name: string;

  /** Pure credential check; no network, never throws */
  isConfigured(): boolean;

  /** Never rejects; failures come back as `ok: false` */
  fetchNotifications(): Promise<FetchResult>;
}

export interface ProviderDeps {
  http: HttpCore;
  logger: Logger;
  metrics: MetricsCollector;
  now?: () => Date; // Fallback timestamp source
}
