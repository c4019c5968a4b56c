// tests/helpers.ts

import { Writable } from 'stream';
import { Logger } from '../src/observability/Logger';
import { MetricsCollector } from '../src/observability/MetricsCollector';
import { createNotification } from '../src/core/notification/Notification';
import type { Notification, NotificationInput } from '../src/core/notification/types';
import type { FetchResult, NotificationProvider } from '../src/providers/types';
import type { DeliveryResult, NotificationSink } from '../src/sinks/types';
import { DeliveryFailedError, FetchFailedError } from '../src/utils/errors';

export const FIXED_TIME = new Date('2024-03-01T12:00:00Z');

export function silentLogger(): Logger {
  return new Logger({ level: 'debug', silent: true });
}

export function disabledMetrics(): MetricsCollector {
  return new MetricsCollector({ enabled: false });
}

export function makeNotification(overrides: Partial<NotificationInput> & { id: string }): Notification {
  return createNotification({
    source: 'GitHub',
    title: `Notification ${overrides.id}`,
    type: 'Mention',
    timestamp: FIXED_TIME,
    ...overrides,
  });
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type Step = Notification[] | Error | (() => Promise<FetchResult>);

/**
 * Provider whose responses are scripted per call; the last step repeats
 */
export class FakeProvider implements NotificationProvider {
  calls = 0;
  configured = true;
  latencyMs = 0;
  private steps: Step[];

  constructor(
    readonly name: string,
    ...steps: Step[]
  ) {
    this.steps = steps.length > 0 ? steps : [[]];
  }

  isConfigured(): boolean {
    return this.configured;
  }

  async fetchNotifications(): Promise<FetchResult> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;

    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }

    if (typeof step === 'function') {
      return step();
    }
    if (step instanceof Error) {
      return { ok: false, error: new FetchFailedError(step.message, { provider: this.name }) };
    }
    return { ok: true, notifications: step, skipped: 0 };
  }
}

/**
 * Sink that records every batch it is given
 */
export class RecordingSink implements NotificationSink {
  readonly batches: Notification[][] = [];
  failWith?: string;

  constructor(readonly name = 'recording') {}

  async deliver(notifications: readonly Notification[]): Promise<DeliveryResult> {
    this.batches.push([...notifications]);
    if (this.failWith) {
      return { ok: false, error: new DeliveryFailedError(this.failWith) };
    }
    return { ok: true, delivered: notifications.length };
  }
}

export const ids = (notifications: readonly Notification[]) =>
  notifications.map((notification) => `${notification.source}:${notification.id}`);

/**
 * Writable that keeps every chunk, for asserting printer output
 */
export class CaptureStream extends Writable {
  private chunks: Buffer[] = [];

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  get output(): Buffer {
    return Buffer.concat(this.chunks);
  }

  get text(): string {
    return this.output.toString('utf8');
  }
}
