#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod promo record schema
 *
 * Downstream loaders validate scraped batches against this file.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { PromoRecordSchema } from '../src/core/normalizer/Normalizer';
import { errorMessage } from '../src/utils/errors';

const OUTPUT_PATH = path.join(__dirname, '../src/core/normalizer/schema.json');

function generateSchema(): void {
  console.log('🔨 Generating JSON Schema from Zod...');

  const jsonSchema = zodToJsonSchema(PromoRecordSchema, {
    name: 'UnifiedPromoRecord',
    $refStrategy: 'none',
    target: 'jsonSchema7',
    definitions: {},
    errorMessages: true,
  });

  const schemaWithMetadata = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'UnifiedPromoRecord',
    description: 'One normalized bank promo (bdo, bpi, eastwest, chinabank)',
    version: '1.0.0',
    ...jsonSchema,
    examples: [
      {
        run_id: '550e8400-e29b-41d4-a716-446655440000',
        source_name: 'eastwest',
        source_url: 'https://www.eastwestbanker.com/promos/example-promo',
        content: 'Example Promo\n\nGet 10% off with your card.',
        captured_on: '2025-06-01',
      },
    ],
  };

  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`✅ JSON Schema generated: ${OUTPUT_PATH}`);
  console.log(`📊 Schema version: ${schemaWithMetadata.version}`);
  console.log(`📄 Fields: ${Object.keys(PromoRecordSchema.shape).join(', ')}`);
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  console.error('❌ Failed to generate JSON Schema:', errorMessage(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
