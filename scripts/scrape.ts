#!/usr/bin/env tsx

/**
 * Scrape one bank and print its promo records as JSON
 *
 * Usage:
 *   tsx scripts/scrape.ts <bdo|bpi|eastwest|chinabank>
 *   npm run scrape -- eastwest
 *
 * Settings come from the environment (see .env.example). Logs go to the
 * console transport; records go to stdout as one JSON array.
 */

import dotenv from 'dotenv';
import path from 'path';
import { PromoScraper, loadConfigFromEnv, errorMessage } from '../src/index';

dotenv.config({ path: path.join(__dirname, '../.env') });

async function main(): Promise<void> {
  const source = process.argv[2];
  const scraper = await PromoScraper.init(loadConfigFromEnv(process.env));

  if (!source) {
    console.error(`Usage: tsx scripts/scrape.ts <${scraper.sources().join('|')}>`);
    process.exit(1);
  }

  const records = await scraper.scrape(source);
  process.stdout.write(`${JSON.stringify(records, null, 2)}\n`);
}

main().catch((error: unknown) => {
  console.error('❌ Scrape failed:', errorMessage(error));
  process.exit(1);
});
