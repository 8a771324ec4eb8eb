// src/config/ConfigValidator.ts

import { z } from 'zod';

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .default({});

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .default({});

// HTTP Configuration Schema
const HttpConfigSchema = z
  .object({
    jsonTimeoutMs: z.number().int().positive().default(5000),
    textTimeoutMs: z.number().int().positive().default(10000),
    userAgent: z.string().min(1).optional(),
  })
  .default({});

// Inter-request delay Schema
const ThrottleConfigSchema = z
  .object({
    minDelayMs: z.number().min(0).default(1000),
    maxDelayMs: z.number().min(0).default(5000),
  })
  .default({})
  .refine((data) => data.maxDelayMs >= data.minDelayMs, {
    message: 'maxDelayMs must be greater than or equal to minDelayMs',
    path: ['maxDelayMs'],
  });

const sampleSize = z.number().int().positive();

// Per-source Configuration Schema
const SourcesConfigSchema = z
  .object({
    bdo: z
      .object({
        identifier: z.string().min(1).optional(),
        pageSize: z.number().int().positive().max(100).default(50),
        catalogId: z.number().int().positive().default(1),
      })
      .default({}),
    bpi: z
      .object({
        sampleSize: sampleSize.optional(),
      })
      .default({}),
    eastwest: z
      .object({
        sampleSize: sampleSize.default(3),
      })
      .default({}),
  })
  .default({});

// Complete Init Configuration Schema
export const InitConfigSchema = z
  .object({
    logging: LoggerConfigSchema,
    metrics: MetricsConfigSchema,
    http: HttpConfigSchema,
    throttle: ThrottleConfigSchema,
    sources: SourcesConfigSchema,
  })
  .default({});

/** What callers pass in; every section and field may be omitted */
export type InitConfig = z.input<typeof InitConfigSchema>;

/** Configuration with defaults applied */
export type ResolvedConfig = z.output<typeof InitConfigSchema>;

/**
 * Validate scraper configuration and apply defaults
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ResolvedConfig {
  return InitConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ResolvedConfig } | { success: false; errors: string[] } {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
