// src/config/env.ts

import { z } from 'zod';
import type { InitConfig } from './ConfigValidator';
import { ConfigError } from '../utils/errors';

// Unset and empty variables both mean "use the default"
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

const booleanFlag = z
  .enum(['1', '0', 'true', 'false'])
  .transform((value) => value === '1' || value === 'true');

const positiveInt = z.coerce.number().int().positive();
const nonNegative = z.coerce.number().min(0);

const EnvSchema = z.object({
  LOG_LEVEL: optionalEnv(z.enum(['debug', 'info', 'warn', 'error'])),
  LOG_FORMAT: optionalEnv(z.enum(['json', 'pretty'])),
  METRICS_ENABLED: optionalEnv(booleanFlag),
  HTTP_JSON_TIMEOUT_MS: optionalEnv(positiveInt),
  HTTP_TEXT_TIMEOUT_MS: optionalEnv(positiveInt),
  HTTP_USER_AGENT: optionalEnv(z.string()),
  THROTTLE_MIN_DELAY_MS: optionalEnv(nonNegative),
  THROTTLE_MAX_DELAY_MS: optionalEnv(nonNegative),
  BDO_CLIENT_IDENTIFIER: optionalEnv(z.string()),
  BDO_PAGE_SIZE: optionalEnv(positiveInt),
  BPI_SAMPLE_SIZE: optionalEnv(positiveInt),
  EASTWEST_SAMPLE_SIZE: optionalEnv(positiveInt),
});

/**
 * Build scraper configuration from environment variables.
 * The result still goes through validateConfig in PromoScraper.init.
 *
 * @throws {ConfigError} If a variable is set to a value of the wrong type
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): NonNullable<InitConfig> {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError('Invalid environment configuration', {
      issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    });
  }

  const vars = result.data;

  return {
    logging: {
      level: vars.LOG_LEVEL,
      format: vars.LOG_FORMAT,
    },
    metrics: {
      enabled: vars.METRICS_ENABLED,
    },
    http: {
      jsonTimeoutMs: vars.HTTP_JSON_TIMEOUT_MS,
      textTimeoutMs: vars.HTTP_TEXT_TIMEOUT_MS,
      userAgent: vars.HTTP_USER_AGENT,
    },
    throttle: {
      minDelayMs: vars.THROTTLE_MIN_DELAY_MS,
      maxDelayMs: vars.THROTTLE_MAX_DELAY_MS,
    },
    sources: {
      bdo: {
        identifier: vars.BDO_CLIENT_IDENTIFIER,
        pageSize: vars.BDO_PAGE_SIZE,
      },
      bpi: {
        sampleSize: vars.BPI_SAMPLE_SIZE,
      },
      eastwest: {
        sampleSize: vars.EASTWEST_SAMPLE_SIZE,
      },
    },
  };
}
