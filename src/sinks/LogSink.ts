// src/sinks/LogSink.ts

import type { DeliveryResult, NotificationSink } from './types';
import type { Notification } from '../core/notification/types';
import type { Logger } from '../observability/Logger';

/**
 * Writes one info line per notification
 */
export class LogSink implements NotificationSink {
  readonly name = 'log';

  constructor(private logger: Logger) {}

  async deliver(notifications: readonly Notification[]): Promise<DeliveryResult> {
    for (const notification of notifications) {
      this.logger.info('Notification', {
        source: notification.source,
        id: notification.id,
        type: notification.type,
        title: notification.title,
        repository: notification.repository,
        reason: notification.reason,
        url: notification.url,
        timestamp: notification.timestamp.toISOString(),
      });
    }

    return { ok: true, delivered: notifications.length };
  }
}
