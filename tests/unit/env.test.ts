// tests/unit/env.test.ts

import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv } from '../../src/config/env';
import { validateConfig } from '../../src/config/ConfigValidator';
import { ConfigError } from '../../src/utils/errors';

describe('loadConfigFromEnv', () => {
  it('should fall back to defaults when nothing is set', () => {
    expect(validateConfig(loadConfigFromEnv({}))).toEqual(validateConfig({}));
  });

  it('should map variables onto the configuration', () => {
    const config = validateConfig(
      loadConfigFromEnv({
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'pretty',
        METRICS_ENABLED: '0',
        HTTP_JSON_TIMEOUT_MS: '2500',
        HTTP_USER_AGENT: 'promo-test-agent',
        THROTTLE_MIN_DELAY_MS: '0',
        THROTTLE_MAX_DELAY_MS: '10',
        BDO_CLIENT_IDENTIFIER: 'test-identifier',
        BDO_PAGE_SIZE: '25',
        EASTWEST_SAMPLE_SIZE: '5',
        BPI_SAMPLE_SIZE: '',
      })
    );

    expect(config.logging).toEqual({ level: 'debug', format: 'pretty' });
    expect(config.metrics).toEqual({ enabled: false });
    expect(config.http).toEqual({ jsonTimeoutMs: 2500, textTimeoutMs: 10000, userAgent: 'promo-test-agent' });
    expect(config.throttle).toEqual({ minDelayMs: 0, maxDelayMs: 10 });
    expect(config.sources.bdo).toEqual({ identifier: 'test-identifier', pageSize: 25, catalogId: 1 });
    expect(config.sources.bpi.sampleSize).toBeUndefined();
    expect(config.sources.eastwest.sampleSize).toBe(5);
  });

  it('should accept true and 1 as enabled flags', () => {
    expect(loadConfigFromEnv({ METRICS_ENABLED: 'true' }).metrics).toEqual({ enabled: true });
    expect(loadConfigFromEnv({ METRICS_ENABLED: '1' }).metrics).toEqual({ enabled: true });
  });

  it('should reject values of the wrong type', () => {
    expect(() => loadConfigFromEnv({ BDO_PAGE_SIZE: 'lots' })).toThrow(ConfigError);
    expect(() => loadConfigFromEnv({ LOG_LEVEL: 'verbose' })).toThrow('Invalid environment configuration');
    expect(() => loadConfigFromEnv({ METRICS_ENABLED: 'yes' })).toThrow(ConfigError);
  });
});
