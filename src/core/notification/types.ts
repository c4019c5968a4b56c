// src/core/notification/types.ts

/**
 * One normalized notification from any source. Identity is the pair
 * (source, id); `id` alone is only unique within its source.
 */
export interface Notification {
  readonly id: string;
  readonly title: string;
  readonly source: string;
  readonly type: string;
  readonly timestamp: Date; // When the event occurred, not when it was fetched
  readonly repository?: string;
  readonly url?: string;
  readonly reason?: string;
  readonly rawData?: Readonly<Record<string, unknown>>; // Diagnostics only
}

/**
 * Fields accepted by createNotification; title and type may be missing
 */
export interface NotificationInput {
  id: string;
  source: string;
  timestamp: Date;
  title?: string | null;
  type?: string | null;
  repository?: string | null;
  url?: string | null;
  reason?: string | null;
  rawData?: Record<string, unknown>;
}

export interface NotificationKey {
  source: string;
  id: string;
}
