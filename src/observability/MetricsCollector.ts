// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // Poll cycle metrics
    this.addCounter('poll_cycles_total', 'Poll cycles run', ['status']);
    this.addHistogram('poll_cycle_duration', 'poll_cycle_duration_seconds', 'Poll cycle duration', [], [
      0.1, 0.5, 1, 2, 5, 10, 30,
    ]);
    this.addCounter('notifications_new_total', 'Notifications reported as new', ['source']);
    this.addGauge('seen_set_size', 'Entries in the seen-set', []);

    // Provider metrics
    this.addCounter('provider_fetch_total', 'Provider fetch attempts', ['provider', 'status']);
    this.addHistogram(
      'provider_fetch_duration',
      'provider_fetch_duration_seconds',
      'Provider fetch duration',
      ['provider'],
      [0.1, 0.5, 1, 2, 5, 10]
    );
    this.addCounter('malformed_items_total', 'Raw items skipped during normalization', ['provider']);

    // Sink metrics
    this.addCounter('deliveries_total', 'Sink deliveries', ['sink', 'status']);

    // HTTP metrics
    this.addCounter('http_requests_total', 'Total HTTP requests', ['provider', 'method', 'status']);
    this.addHistogram(
      'http_request_duration',
      'http_request_duration_seconds',
      'HTTP request duration',
      ['provider', 'status'],
      [0.1, 0.5, 1, 2, 5]
    );
    this.addCounter('http_cache_hits_total', 'HTTP cache hits', ['provider']);
    this.addCounter('http_errors_total', 'HTTP errors', ['provider', 'status']);
    this.addGauge('rate_limit_queue_size', 'Current rate limit queue size', ['provider']);
  }

  private addCounter(name: string, help: string, labelNames: string[]): void {
    this.counters.set(name, new Counter({ name, help, labelNames, registers: [this.registry] }));
  }

  private addHistogram(
    key: string,
    name: string,
    help: string,
    labelNames: string[],
    buckets: number[]
  ): void {
    this.histograms.set(
      key,
      new Histogram({ name, help, labelNames, buckets, registers: [this.registry] })
    );
  }

  private addGauge(name: string, help: string, labelNames: string[]): void {
    this.gauges.set(name, new Gauge({ name, help, labelNames, registers: [this.registry] }));
  }

  incrementCounter(name: string, labels: Labels = {}, value = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }

      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          this.logger?.error('Metrics rendering failed', {
            error: error instanceof Error ? error.message : String(error),
          });
          res.statusCode = 500;
          res.end();
        });
    });

    this.server.on('error', (error: NodeJS.ErrnoException) => {
      this.logger?.error('MetricsCollector server error', { port, code: error.code, error: error.message });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = undefined;
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
