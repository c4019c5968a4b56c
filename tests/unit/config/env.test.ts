// tests/unit/config/env.test.ts

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildConfigFromEnv, loadConfigFromEnv, loadEnvFile } from '../../../src/config/env';
import { ConfigError } from '../../../src/utils/errors';

describe('loadConfigFromEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfigFromEnv({});

    expect(config.polling).toEqual({ intervalMs: 60000, primeOnStart: true, fetchConcurrency: 1 });
    expect(config.sink).toEqual({ type: 'printer', printer: { width: 32 } });
    expect(config.rss.feeds).toEqual([]);
    expect(config.github.token).toBeUndefined();
    expect(config.seenStore).toBeUndefined();
    expect(config.metrics).toEqual({ enabled: false });
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
    expect(config.http.circuitBreaker).toEqual({ threshold: 5, resetTimeout: 60000 });
  });

  it('should read every supported variable', () => {
    const config = loadConfigFromEnv({
      GITHUB_TOKEN: 'test-token',
      GITHUB_API_URL: 'https://ghe.example.com/api/v3',
      GITHUB_PARTICIPATING: 'yes',
      GITHUB_ALL: 'false',
      GITHUB_PER_PAGE: '25',
      GITHUB_MAX_PAGES: '2',
      RSS_FEEDS: 'https://blog.example.com/feed.xml, https://status.example.org/rss,',
      POLL_INTERVAL_SECONDS: '30',
      PRIME_ON_START: '0',
      PROVIDER_TIMEOUT_MS: '15000',
      DELIVERY_TIMEOUT_MS: '20000',
      FETCH_CONCURRENCY: '2',
      SINK: 'both',
      PRINTER_DEVICE: '/dev/rfcomm0',
      PRINTER_WIDTH: '48',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      METRICS_PORT: '9464',
      SEEN_STORE_BACKEND: 'redis',
      SEEN_STORE_URL: 'redis://localhost:6379',
      SEEN_STORE_NAMESPACE: 'desk',
      HTTP_TIMEOUT_MS: '10000',
      HTTP_MAX_RETRIES: '1',
      HTTP_BREAKER_THRESHOLD: '3',
      HTTP_BREAKER_RESET_MS: '15000',
    });

    expect(config.github).toEqual({
      token: 'test-token',
      apiUrl: 'https://ghe.example.com/api/v3',
      all: false,
      participating: true,
      perPage: 25,
      maxPages: 2,
    });
    expect(config.rss.feeds).toEqual(['https://blog.example.com/feed.xml', 'https://status.example.org/rss']);
    expect(config.polling).toEqual({
      intervalMs: 30000,
      primeOnStart: false,
      providerTimeoutMs: 15000,
      deliveryTimeoutMs: 20000,
      fetchConcurrency: 2,
    });
    expect(config.sink).toEqual({ type: 'both', printer: { devicePath: '/dev/rfcomm0', width: 48 } });
    expect(config.seenStore).toEqual({ backend: 'redis', url: 'redis://localhost:6379', namespace: 'desk' });
    expect(config.metrics).toEqual({ enabled: true, port: 9464 });
    expect(config.http.timeout).toBe(10000);
    expect(config.http.retry.maxRetries).toBe(1);
    expect(config.http.circuitBreaker).toEqual({ threshold: 3, resetTimeout: 15000 });
  });

  it('should reject values that do not parse', () => {
    expect(() => loadConfigFromEnv({ POLL_INTERVAL_SECONDS: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfigFromEnv({ PRIME_ON_START: 'maybe' })).toThrow(/polling\.primeOnStart/);
    expect(() => loadConfigFromEnv({ SINK: 'fax' })).toThrow(/sink\.type/);
  });

  it('should leave unparseable values for validation to report', () => {
    const raw = buildConfigFromEnv({ GITHUB_ALL: 'sometimes' });

    expect(raw.github).toMatchObject({ all: 'sometimes' });
  });
});

describe('loadEnvFile', () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    delete process.env.NOTIFIER_TEST_VALUE;
    if (tmpDir) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('should load variables from the file', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-'));
    const file = path.join(tmpDir, '.env');
    fs.writeFileSync(file, 'NOTIFIER_TEST_VALUE=from-file\n');

    expect(loadEnvFile(file)).toBe(true);
    expect(process.env.NOTIFIER_TEST_VALUE).toBe('from-file');
  });

  it('should not override variables already set', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-'));
    const file = path.join(tmpDir, '.env');
    fs.writeFileSync(file, 'NOTIFIER_TEST_VALUE=from-file\n');
    process.env.NOTIFIER_TEST_VALUE = 'from-shell';

    loadEnvFile(file);

    expect(process.env.NOTIFIER_TEST_VALUE).toBe('from-shell');
  });

  it('should report a missing file without failing', () => {
    expect(loadEnvFile(path.join(os.tmpdir(), 'definitely-missing.env'))).toBe(false);
  });
});
