// src/sinks/printer/ReceiptPrinterSink.ts

import type { DeliveryResult, NotificationSink } from '../types';
import type { Notification } from '../../core/notification/types';
import type { Logger } from '../../observability/Logger';
import type { ReceiptPrinter } from './ReceiptPrinter';
import { renderReceipt, type ReceiptFormatOptions } from './ReceiptFormatter';
import { DeliveryFailedError, errorMessage } from '../../utils/errors';

export interface ReceiptPrinterSinkOptions extends ReceiptFormatOptions {
  feedLines?: number; // Blank feed after the receipt so it can be torn off (default: 3)
  now?: () => Date;
}

/**
 * Prints each batch as one receipt. A fresh printer connection is opened per
 * batch and always closed afterwards.
 */
export class ReceiptPrinterSink implements NotificationSink {
  readonly name = 'printer';

  constructor(
    private createPrinter: () => ReceiptPrinter,
    private logger: Logger,
    private options: ReceiptPrinterSinkOptions = {}
  ) {}

  async deliver(notifications: readonly Notification[]): Promise<DeliveryResult> {
    if (notifications.length === 0) {
      return { ok: true, delivered: 0 };
    }

    const printer = this.createPrinter();

    try {
      await printer.connect();
    } catch (error: unknown) {
      this.logger.error('Failed to connect to printer', { error: errorMessage(error) });
      return {
        ok: false,
        error: new DeliveryFailedError('Failed to connect to printer', { cause: errorMessage(error) }),
      };
    }

    try {
      const printedAt = this.options.now ? this.options.now() : new Date();
      for (const line of renderReceipt(notifications, printedAt, this.options)) {
        await printer.printLine(line);
      }
      await printer.feedLines(this.options.feedLines ?? 3);

      this.logger.info('Receipt printed', { notifications: notifications.length });
      return { ok: true, delivered: notifications.length };
    } catch (error: unknown) {
      this.logger.error('Printing failed', { error: errorMessage(error) });
      return {
        ok: false,
        error: new DeliveryFailedError('Printing failed', { cause: errorMessage(error) }),
      };
    } finally {
      await printer.close().catch((error: unknown) => {
        this.logger.warn('Failed to close printer', { error: errorMessage(error) });
      });
    }
  }
}
