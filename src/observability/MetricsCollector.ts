// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['source', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['source', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['source', 'kind'],
        registers: [this.registry],
      })
    );

    // Pipeline metrics
    this.counters.set(
      'items_skipped',
      new Counter({
        name: 'items_skipped_total',
        help: 'Items skipped after a per-item failure',
        labelNames: ['source', 'stage'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'records_emitted',
      new Counter({
        name: 'records_emitted_total',
        help: 'Normalized promo records returned',
        labelNames: ['source'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'scrape_runs',
      new Counter({
        name: 'scrape_runs_total',
        help: 'Scrape invocations',
        labelNames: ['source', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'scrape_duration',
      new Histogram({
        name: 'scrape_duration_seconds',
        help: 'Scrape invocation duration',
        labelNames: ['source', 'status'],
        buckets: [1, 10, 30, 60, 300, 900, 1800],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>, value: number = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
