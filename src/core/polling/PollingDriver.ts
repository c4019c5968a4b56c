// src/core/polling/PollingDriver.ts

import type { NotificationManager } from '../manager/NotificationManager';
import type { NotificationSink, DeliveryResult } from '../../sinks/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { generateCorrelationId, withPollSpan } from '../../observability/tracing';
import { withTimeout } from '../../utils/timeout';
import { DeliveryFailedError, DeliveryTimeoutError, errorCode, errorMessage } from '../../utils/errors';

export interface PollingDriverOptions {
  manager: NotificationManager;
  sink: NotificationSink;
  logger: Logger;
  metrics: MetricsCollector;
  intervalMs: number;
  deliveryTimeoutMs?: number;
  primeOnStart?: boolean; // Mark the current backlog seen without delivering it
}

export type CycleStatus = 'delivered' | 'idle' | 'delivery_failed' | 'failed';

export interface CycleReport {
  cycleId: string;
  status: CycleStatus;
  newCount: number;
  durationMs: number;
  error?: string;
}

/**
 * Runs poll cycles on a fixed period. The next cycle is scheduled once the
 * previous one has finished, so cycles never overlap; stop() is honoured
 * between cycles.
 */
export class PollingDriver {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private readonly options: PollingDriverOptions;

  constructor(options: PollingDriverOptions) {
    this.options = options;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.running = true;
    this.options.logger.info('Polling started', {
      intervalMs: this.options.intervalMs,
      providers: this.options.manager.providers.map((provider) => provider.name),
      sink: this.options.sink.name,
    });

    if (this.options.primeOnStart) {
      const priming = this.prime();
      // stop() waits for priming like a cycle; prime errors reach start()'s caller
      this.inFlight = priming.then(
        () => undefined,
        () => undefined
      );
      try {
        await priming;
      } catch (error: unknown) {
        this.running = false;
        throw error;
      } finally {
        this.inFlight = null;
      }
    }

    this.schedule(0);
  }

  /**
   * Cancel the schedule and wait for a cycle in progress to complete
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    this.options.logger.info('Polling stopped');
  }

  /**
   * Record everything currently listed as seen, without delivering it
   *
   * @returns Number of notifications now tracked
   */
  async prime(): Promise<number> {
    const existing = await this.options.manager.getAllNotifications();
    const added = this.options.manager.markAsSeen(existing);
    this.options.logger.info('Tracking existing notifications', { existing: existing.length, added });
    return added;
  }

  /**
   * Fetch the delta and hand it to the sink. Never rejects.
   */
  async runCycle(): Promise<CycleReport> {
    const cycleId = generateCorrelationId();
    const startTime = Date.now();
    const { manager, logger, metrics } = this.options;

    const report = await withPollSpan(cycleId, async (): Promise<CycleReport> => {
      let newCount = 0;
      try {
        logger.debug('Checking for new notifications', { cycleId });
        const fresh = await manager.getNewNotifications();
        newCount = fresh.length;

        const delivery = await this.deliver(fresh);
        if (!delivery.ok) {
          // Items stay seen: a failed delivery is not retried next cycle
          logger.error('Delivery failed', {
            cycleId,
            sink: this.options.sink.name,
            code: delivery.error.code,
            error: delivery.error.message,
            lost: newCount,
          });
          return this.report(cycleId, 'delivery_failed', newCount, startTime, delivery.error.message);
        }

        if (newCount === 0) {
          logger.debug('No new notifications', { cycleId });
          return this.report(cycleId, 'idle', 0, startTime);
        }

        logger.info('New notifications delivered', { cycleId, count: newCount, sink: this.options.sink.name });
        return this.report(cycleId, 'delivered', newCount, startTime);
      } catch (error: unknown) {
        logger.error('Poll cycle failed', { cycleId, code: errorCode(error), error: errorMessage(error) });
        return this.report(cycleId, 'failed', newCount, startTime, errorMessage(error));
      }
    });

    metrics.incrementCounter('poll_cycles_total', { status: report.status });
    metrics.recordLatency('poll_cycle_duration', report.durationMs);
    return report;
  }

  private async deliver(notifications: Parameters<NotificationSink['deliver']>[0]): Promise<DeliveryResult> {
    const { sink, deliveryTimeoutMs, metrics } = this.options;

    let result: DeliveryResult;
    try {
      result = await withTimeout(
        sink.deliver(notifications),
        deliveryTimeoutMs,
        () => new DeliveryTimeoutError(sink.name, deliveryTimeoutMs ?? 0)
      );
    } catch (error: unknown) {
      const failure =
        error instanceof DeliveryFailedError
          ? error
          : new DeliveryFailedError(`Sink ${sink.name} threw: ${errorMessage(error)}`, { sink: sink.name });
      result = { ok: false, error: failure };
    }

    metrics.incrementCounter('deliveries_total', { sink: sink.name, status: result.ok ? 'success' : 'failed' });
    return result;
  }

  private schedule(delayMs: number): void {
    if (!this.running) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.runCycle();
    } finally {
      this.inFlight = null;
      this.schedule(this.options.intervalMs);
    }
  }

  private report(
    cycleId: string,
    status: CycleStatus,
    newCount: number,
    startTime: number,
    error?: string
  ): CycleReport {
    return {
      cycleId,
      status,
      newCount,
      durationMs: Date.now() - startTime,
      ...(error !== undefined && { error }),
    };
  }
}
