// src/sinks/types.ts

import type { Notification } from '../core/notification/types';
import type { DeliveryFailedError } from '../utils/errors';

export type DeliveryResult =
  | { ok: true; delivered: number }
  | { ok: false; error: DeliveryFailedError };

/**
 * Consumer of new-notification batches
 */
export interface NotificationSink {
  readonly name: string;

  /**
   * Deliver one ordered batch. An empty batch is a no-op success.
   */
  deliver(notifications: readonly Notification[]): Promise<DeliveryResult>;
}
