// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import { SOURCE_NAMES } from './types';
import type { NormalizeContext, RawDetailRecord, UnifiedPromoRecord } from './types';
import { SourceMappers } from './SourceMappers';
import { RecordValidationError } from '../../utils/errors';

// Validation schema (exported for JSON Schema generation)
export const PromoRecordSchema = z.object({
  run_id: z.string().min(1),
  source_name: z.enum(SOURCE_NAMES),
  source_url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'source_url must be http(s)' }),
  content: z.string(),
  captured_on: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'captured_on must be YYYY-MM-DD'),
});

/**
 * Calendar date (local time) of a capture, without time component
 */
export function formatCaptureDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export class Normalizer {
  private mappers: SourceMappers;

  constructor() {
    this.mappers = new SourceMappers();
  }

  /**
   * Map one raw detail record onto the unified record shape
   *
   * @throws {RecordValidationError} If the mapped record fails schema validation
   */
  normalize(raw: RawDetailRecord, ctx: NormalizeContext): UnifiedPromoRecord {
    const normalized = this.map(raw, ctx);

    const result = PromoRecordSchema.safeParse(normalized);
    if (!result.success) {
      throw new RecordValidationError(
        `Schema validation failed for ${normalized.source_name} record`,
        {
          kind: raw.kind,
          url: raw.url,
          issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
        },
        result.error
      );
    }

    return normalized;
  }

  private map(raw: RawDetailRecord, ctx: NormalizeContext): UnifiedPromoRecord {
    switch (raw.kind) {
      case 'bdo-campaign':
        return this.mappers.get('bdo-campaign')(raw, ctx);
      case 'bdo-reward':
        return this.mappers.get('bdo-reward')(raw, ctx);
      case 'page':
        return this.mappers.get('page')(raw, ctx);
    }
  }
}
