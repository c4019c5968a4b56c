// tests/unit/sinks/ReceiptPrinter.test.ts

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ReceiptPrinter } from '../../../src/sinks/printer/ReceiptPrinter';
import { CaptureStream } from '../../helpers';

describe('ReceiptPrinter', () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('should need a device path or a stream', () => {
    expect(() => new ReceiptPrinter({})).toThrow('ReceiptPrinter needs a devicePath or a stream');
  });

  it('should write plain lines and newline feeds to a stream', async () => {
    const stream = new CaptureStream();
    const printer = new ReceiptPrinter({ stream });

    await printer.connect();
    await printer.printLine('Hello');
    await printer.printLine();
    await printer.feedLines(2);
    await printer.close();

    expect(stream.text).toBe('Hello\n\n\n\n');
    expect(stream.writableEnded).toBe(false);
  });

  it('should send ESC/POS init and feed commands when enabled', async () => {
    const stream = new CaptureStream();
    const printer = new ReceiptPrinter({ stream, escPos: true });

    await printer.connect();
    await printer.printLine('A');
    await printer.feedLines(3);

    expect(stream.output).toEqual(Buffer.from([0x1b, 0x40, 0x41, 0x0a, 0x1b, 0x64, 0x03]));
  });

  it('should refuse to print before connecting', async () => {
    const printer = new ReceiptPrinter({ stream: new CaptureStream() });

    expect(printer.isConnected).toBe(false);
    await expect(printer.printLine('A')).rejects.toThrow('Printer is not connected');
  });

  it('should open, write and close a device file', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'printer-'));
    const devicePath = path.join(tmpDir, 'rfcomm0');
    const printer = new ReceiptPrinter({ devicePath });

    await printer.connect();
    expect(printer.isConnected).toBe(true);
    await printer.printLine('Hi');
    await printer.close();

    expect(printer.isConnected).toBe(false);
    expect(fs.readFileSync(devicePath)).toEqual(Buffer.from([0x1b, 0x40, 0x48, 0x69, 0x0a]));
  });

  it('should reject connect when the device cannot be opened', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'printer-'));
    const printer = new ReceiptPrinter({ devicePath: path.join(tmpDir, 'missing', 'rfcomm0') });

    await expect(printer.connect()).rejects.toThrow(/ENOENT/);
  });

  // /dev/full accepts opens and fails every write with ENOSPC
  const hasFullDevice = fs.existsSync('/dev/full');

  it.skipIf(!hasFullDevice)('should reject writes and close after the device fails', async () => {
    const printer = new ReceiptPrinter({ devicePath: '/dev/full', escPos: false });

    await printer.connect();
    await expect(printer.printLine('A')).rejects.toThrow(/ENOSPC/);
    await expect(printer.printLine('B')).rejects.toThrow(/ENOSPC/);
    await expect(printer.close()).rejects.toThrow(/ENOSPC/);
    expect(printer.isConnected).toBe(false);
  });

  it.skipIf(!hasFullDevice)('should release the device when the init command fails', async () => {
    const printer = new ReceiptPrinter({ devicePath: '/dev/full' });

    await expect(printer.connect()).rejects.toThrow(/ENOSPC/);
    expect(printer.isConnected).toBe(false);
  });
});
