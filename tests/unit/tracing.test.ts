/**
 * Tracing Unit Tests
 *
 * No tracer provider is registered, so the API hands out non-recording
 * spans. That is enough to check that spans are opened, closed and marked.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SpanStatusCode, type Span } from '@opentelemetry/api';
import * as tracing from '../../src/observability/tracing';

describe('Tracing', () => {
  beforeEach(() => {
    delete process.env.OTEL_ENABLED;
  });

  afterEach(() => {
    delete process.env.OTEL_ENABLED;
  });

  describe('isOTelEnabled', () => {
    it('should be off by default', () => {
      expect(tracing.isOTelEnabled()).toBe(false);
      expect(tracing.getTracer()).toBeNull();
    });

    it('should accept 1 and true', () => {
      process.env.OTEL_ENABLED = '1';
      expect(tracing.isOTelEnabled()).toBe(true);

      process.env.OTEL_ENABLED = 'true';
      expect(tracing.isOTelEnabled()).toBe(true);

      process.env.OTEL_ENABLED = 'yes';
      expect(tracing.isOTelEnabled()).toBe(false);
    });
  });

  describe('withSpan', () => {
    it('should run the function without a span when disabled', async () => {
      const fn = vi.fn(async (span: Span | null) => (span === null ? 'no-span' : 'span'));

      await expect(tracing.withSpan('test', fn)).resolves.toBe('no-span');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should pass a span and end it when enabled', async () => {
      process.env.OTEL_ENABLED = '1';
      let endCalls = 0;

      const result = await tracing.withSpan(
        'test',
        async (span) => {
          expect(span).not.toBeNull();
          if (span) {
            vi.spyOn(span, 'end').mockImplementation(() => {
              endCalls++;
            });
          }
          return 42;
        },
        { 'test.attribute': 'value' }
      );

      expect(result).toBe(42);
      expect(endCalls).toBe(1);
    });

    it('should mark the span as failed and rethrow', async () => {
      process.env.OTEL_ENABLED = '1';
      const statuses: number[] = [];

      await expect(
        tracing.withSpan('failing', async (span) => {
          if (span) {
            vi.spyOn(span, 'setStatus').mockImplementation((status) => {
              statuses.push(status.code);
              return span;
            });
          }
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(statuses).toEqual([SpanStatusCode.ERROR]);
    });
  });

  describe('helpers', () => {
    it('should pass results through withHttpSpan and withScrapeSpan', async () => {
      process.env.OTEL_ENABLED = 'true';

      await expect(tracing.withHttpSpan('GET', 'https://bank.example.test/', async () => 'ok')).resolves.toBe('ok');
      await expect(tracing.withScrapeSpan('bpi', 'run-0001', async () => 3)).resolves.toBe(3);
    });
  });
});
