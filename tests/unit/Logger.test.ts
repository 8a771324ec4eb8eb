// tests/unit/Logger.test.ts

import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json', silent: true });

  it('should redact the bearer token and authorization values', () => {
    const redacted = logger['redactSensitive']({
      url: 'https://www.deals.bdo.com.ph/v4/oauth/token',
      bearer_token: 'test-token',
      Authorization: 'Bearer test-token',
    });

    expect(redacted).toEqual({
      url: 'https://www.deals.bdo.com.ph/v4/oauth/token',
      bearer_token: '[REDACTED]',
      Authorization: '[REDACTED]',
    });
  });

  it('should redact the client identifier', () => {
    expect(logger['redactSensitive']({ identifier: 'test-identifier' }).identifier).toBe('[REDACTED]');
  });

  it('should redact nested request headers', () => {
    const redacted = logger['redactSensitive']({
      headers: { Authorization: 'Bearer test-token', Origin: 'https://www.deals.bdo.com.ph' },
    });

    expect(redacted.headers).toEqual({
      Authorization: '[REDACTED]',
      Origin: 'https://www.deals.bdo.com.ph',
    });
  });

  it('should preserve non-sensitive data', () => {
    const data = { runId: 'run-0001', source: 'bdo', records: 12, durationMs: 245 };

    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should stamp child metadata through the underlying logger', () => {
    const base = winston.createLogger({ silent: true });
    const childSpy = vi.spyOn(base, 'child');

    new Logger({}, base).child({ runId: 'run-0001', source: 'bdo', identifier: 'test-identifier' });

    expect(childSpy).toHaveBeenCalledWith({
      runId: 'run-0001',
      source: 'bdo',
      identifier: '[REDACTED]',
    });
  });

  it('should pass redacted metadata to winston', () => {
    const base = winston.createLogger({ silent: true });
    const infoSpy = vi.spyOn(base, 'info');

    new Logger({}, base).info('Retrieved bearer token', { bearer_token: 'test-token' });

    expect(infoSpy).toHaveBeenCalledWith('Retrieved bearer token', { bearer_token: '[REDACTED]' });
  });

  it('should not throw when logging', () => {
    expect(() => {
      logger.debug('Debug message', { key: 'value' });
      logger.info('Info message', { key: 'value' });
      logger.warn('Warn message');
      logger.error('Error message', { key: 'value' });
    }).not.toThrow();
  });
});
