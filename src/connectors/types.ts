// src/connectors/types.ts

import type { SourceName, RawDetailRecord, UnifiedPromoRecord } from '../core/normalizer/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { Throttle } from '../utils/throttle';

/**
 * One source adapter: discovery, detail retrieval and normalization.
 *
 * `TCatalog` is whatever discovery hands to the detail stage (item references,
 * page URLs, auth headers). Stages run strictly in order within one scrape.
 */
export interface Connector<TCatalog, TDetail extends RawDetailRecord = RawDetailRecord> {
  readonly name: SourceName;

  discover(ctx: ScrapeContext): Promise<TCatalog>;
  fetchDetails(ctx: ScrapeContext, catalog: TCatalog): Promise<TDetail[]>;
  normalize(ctx: ScrapeContext, details: TDetail[]): UnifiedPromoRecord[];
}

/**
 * Everything a connector may touch during one scrape invocation
 */
export interface ScrapeContext {
  runId: string;
  capturedOn: string;              // YYYY-MM-DD
  source: SourceName;
  http: HttpCore;                  // Per-run instance, metrics labelled with `source`
  normalizer: Normalizer;
  throttle: Throttle;
  logger: Logger;                  // Child logger carrying runId and source
  metrics: MetricsCollector;
}

// Where in the pipeline an item was dropped (items_skipped_total label)
export type SkipStage = 'category' | 'page' | 'detail' | 'record';

export type ConnectorRegistry = Record<SourceName, Connector<unknown>>;
