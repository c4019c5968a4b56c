// src/sinks/FanOutSink.ts

import type { DeliveryResult, NotificationSink } from './types';
import type { Notification } from '../core/notification/types';
import type { Logger } from '../observability/Logger';
import { DeliveryFailedError, errorMessage } from '../utils/errors';

/**
 * Delivers every batch to all sinks concurrently. Succeeds only when each
 * sink succeeds; one failing sink does not stop the others.
 */
export class FanOutSink implements NotificationSink {
  readonly name: string;

  constructor(
    private sinks: NotificationSink[],
    private logger: Logger
  ) {
    this.name = `fanout(${sinks.map((sink) => sink.name).join(',')})`;
  }

  async deliver(notifications: readonly Notification[]): Promise<DeliveryResult> {
    if (notifications.length === 0) {
      return { ok: true, delivered: 0 };
    }

    const results = await Promise.allSettled(this.sinks.map((sink) => sink.deliver(notifications)));

    const failed: string[] = [];
    results.forEach((result, index) => {
      const sink = this.sinks[index].name;
      if (result.status === 'rejected') {
        failed.push(sink);
        this.logger.error('Sink threw during delivery', { sink, error: errorMessage(result.reason) });
      } else if (!result.value.ok) {
        failed.push(sink);
        this.logger.error('Sink delivery failed', { sink, error: result.value.error.message });
      }
    });

    if (failed.length > 0) {
      return {
        ok: false,
        error: new DeliveryFailedError(`${failed.length} of ${this.sinks.length} sink(s) failed`, {
          failed,
        }),
      };
    }

    return { ok: true, delivered: notifications.length };
  }
}
