// src/connectors/shared.ts

import type { PageDetail, RawDetailRecord, UnifiedPromoRecord } from '../core/normalizer/types';
import type { ScrapeContext, SkipStage } from './types';
import { extractText } from '../core/html/HtmlExtractor';
import { ExtractionError, TransportError, errorMessage } from '../utils/errors';

/**
 * Log and count an item that will not produce a record
 */
export function skipItem(
  ctx: ScrapeContext,
  stage: SkipStage,
  message: string,
  meta: Record<string, unknown> & { error?: unknown }
): void {
  const { error, ...rest } = meta;
  ctx.logger.warn(message, {
    ...rest,
    stage,
    ...(error !== undefined ? { error: errorMessage(error) } : {}),
  });
  ctx.metrics.incrementCounter('items_skipped', { source: ctx.source, stage });
}

/**
 * Normalize each detail record in order. A record that fails validation or
 * mapping is skipped; the rest still come through.
 */
export function normalizeDetails(ctx: ScrapeContext, details: RawDetailRecord[]): UnifiedPromoRecord[] {
  const records: UnifiedPromoRecord[] = [];

  for (const detail of details) {
    try {
      records.push(ctx.normalizer.normalize(detail, ctx));
    } catch (error: unknown) {
      skipItem(ctx, 'record', 'Dropping record that could not be normalized', { url: detail.url, error });
    }
  }

  return records;
}

/**
 * Fetch one HTML page and pull the text under `locator`. Any failure on the
 * page is logged and counted; the throttle pauses either way.
 */
export async function fetchPageDetail(
  ctx: ScrapeContext,
  url: string,
  locator: string
): Promise<PageDetail | undefined> {
  try {
    const html = await ctx.http.getText(url);
    return { kind: 'page', source: ctx.source, url, text: extractText(html, locator) };
  } catch (error: unknown) {
    if (error instanceof ExtractionError) {
      skipItem(ctx, 'detail', 'Content anchor missing, skipping page', { url, error });
      return undefined;
    }
    if (error instanceof TransportError) {
      skipItem(ctx, 'detail', 'Page fetch failed, skipping page', { url, error });
      return undefined;
    }
    skipItem(ctx, 'detail', 'Page extraction failed, skipping page', { url, error });
    return undefined;
  } finally {
    await ctx.throttle.pause();
  }
}
