// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

/**
 * Per-parser Prometheus registry. Exposition is left to the host
 * application via getMetrics().
 */
export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    this.counters.set(
      'parse_total',
      new Counter({
        name: 'rss_parse_total',
        help: 'RSS parse calls by outcome',
        labelNames: ['outcome'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'parse_duration',
      new Histogram({
        name: 'rss_parse_duration_seconds',
        help: 'RSS parse duration',
        labelNames: ['outcome'],
        buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'items_parsed',
      new Gauge({
        name: 'rss_items_parsed',
        help: 'Number of items in the most recently parsed feed',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'structures_dropped',
      new Counter({
        name: 'rss_structures_dropped_total',
        help: 'Optional structures and items dropped as malformed',
        labelNames: ['element'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number> = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number> = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number> = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
