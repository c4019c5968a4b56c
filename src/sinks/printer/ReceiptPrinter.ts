// src/sinks/printer/ReceiptPrinter.ts

import * as fs from 'fs';
import { once } from 'events';
import { finished } from 'stream/promises';
import type { Writable } from 'stream';

// ESC/POS commands
const ESC_INIT = Buffer.from([0x1b, 0x40]);
const escFeed = (lines: number) => Buffer.from([0x1b, 0x64, Math.max(0, Math.min(255, lines))]);

export interface ReceiptPrinterOptions {
  devicePath?: string; // e.g. a Bluetooth serial port such as /dev/rfcomm0
  stream?: Writable; // Used as-is and never closed by the printer
  escPos?: boolean; // Send ESC/POS init/feed bytes (default: true for devices)
}

/**
 * Line-oriented writer for an ESC/POS receipt printer reachable as a byte stream
 */
export class ReceiptPrinter {
  private output?: Writable;
  private ownsOutput = false;
  private failure?: Error; // First error the device stream emitted
  private escPos: boolean;

  constructor(private options: ReceiptPrinterOptions) {
    if (!options.devicePath && !options.stream) {
      throw new Error('ReceiptPrinter needs a devicePath or a stream');
    }
    this.escPos = options.escPos ?? options.devicePath !== undefined;
  }

  get isConnected(): boolean {
    return this.output !== undefined;
  }

  async connect(): Promise<void> {
    if (this.output) return;

    if (this.options.stream) {
      this.output = this.options.stream;
    } else if (this.options.devicePath) {
      const stream = fs.createWriteStream(this.options.devicePath, { flags: 'a' });
      // Kept for the stream's lifetime: a device that drops mid-write emits 'error'
      stream.on('error', (error: Error) => {
        if (!this.failure) this.failure = error;
      });
      await once(stream, 'open');
      this.output = stream;
      this.ownsOutput = true;
    }

    if (this.escPos) {
      try {
        await this.write(ESC_INIT);
      } catch (error: unknown) {
        if (this.ownsOutput) this.output?.destroy();
        this.output = undefined;
        this.ownsOutput = false;
        throw error;
      }
    }
  }

  async printLine(text = ''): Promise<void> {
    await this.write(Buffer.from(`${text}\n`, 'utf8'));
  }

  async feedLines(lines: number): Promise<void> {
    if (this.escPos) {
      await this.write(escFeed(lines));
    } else {
      await this.write(Buffer.from('\n'.repeat(lines), 'utf8'));
    }
  }

  async close(): Promise<void> {
    const output = this.output;
    this.output = undefined;

    if (!output || !this.ownsOutput) return;
    this.ownsOutput = false;

    const failure = this.failureOf(output);
    if (failure) {
      output.destroy();
      throw failure;
    }

    output.end();
    await finished(output);
    const lateFailure = this.failureOf(output);
    if (lateFailure) {
      throw lateFailure;
    }
  }

  private failureOf(output: Writable): Error | undefined {
    return this.failure ?? output.errored ?? undefined;
  }

  private write(chunk: Buffer): Promise<void> {
    const output = this.output;
    if (!output) {
      return Promise.reject(new Error('Printer is not connected'));
    }
    const failure = this.failureOf(output);
    if (failure) {
      return Promise.reject(failure);
    }

    return new Promise((resolve, reject) => {
      output.write(chunk, (error) => (error ? reject(error) : resolve()));
    });
  }
}
