/**
 * MetricsCollector Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

describe('MetricsCollector', () => {
  it('should expose pipeline counters in Prometheus text format', async () => {
    const metrics = new MetricsCollector();

    metrics.incrementCounter('records_emitted', { source: 'bpi' }, 4);
    metrics.incrementCounter('items_skipped', { source: 'bpi', stage: 'detail' });
    metrics.incrementCounter('items_skipped', { source: 'bpi', stage: 'detail' });

    const text = await metrics.getMetrics();

    expect(text).toContain('records_emitted_total{source="bpi"} 4');
    expect(text).toContain('items_skipped_total{source="bpi",stage="detail"} 2');
  });

  it('should record latencies in seconds', async () => {
    const metrics = new MetricsCollector();

    metrics.recordLatency('http_request_duration', 250, { source: 'bdo', status: 200 });

    const text = await metrics.getMetrics();

    expect(text).toContain('http_request_duration_seconds_sum{source="bdo",status="200"} 0.25');
    expect(text).toContain('http_request_duration_seconds_count{source="bdo",status="200"} 1');
  });

  it('should keep registries separate between collectors', async () => {
    const first = new MetricsCollector();
    const second = new MetricsCollector();

    first.incrementCounter('scrape_runs', { source: 'chinabank', status: 'success' });

    expect(await second.getMetrics()).not.toContain('scrape_runs_total{');
  });

  it('should register nothing when disabled', async () => {
    const metrics = new MetricsCollector({ enabled: false });

    metrics.incrementCounter('records_emitted', { source: 'bpi' });
    metrics.recordLatency('scrape_duration', 1000, { source: 'bpi', status: 'success' });

    expect((await metrics.getMetrics()).trim()).toBe('');
  });

  it('should ignore unknown metric names', () => {
    const metrics = new MetricsCollector();

    expect(() => metrics.incrementCounter('unknown_metric', { source: 'bpi' })).not.toThrow();
  });
});
