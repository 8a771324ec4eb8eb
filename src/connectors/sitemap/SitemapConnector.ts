// src/connectors/sitemap/SitemapConnector.ts

import type { Connector, ScrapeContext } from '../types';
import type { PageDetail, SourceName, UnifiedPromoRecord } from '../../core/normalizer/types';
import type { SitemapConnectorOptions, SitemapSourceConfig } from './types';
import { readSitemap } from '../../core/sitemap/SitemapReader';
import { fetchPageDetail, normalizeDetails } from '../shared';

/**
 * Connector for banks that publish each promo as its own page listed in the
 * sitemap. One instance per bank; the bank table lives in `banks.ts`.
 */
export class SitemapConnector implements Connector<string[], PageDetail> {
  readonly name: SourceName;
  private sampleSize?: number;

  constructor(
    private source: SitemapSourceConfig,
    options: SitemapConnectorOptions = {}
  ) {
    this.name = source.name;
    this.sampleSize = options.sampleSize ?? source.sampleSize;
  }

  async discover(ctx: ScrapeContext): Promise<string[]> {
    const urls = await readSitemap(ctx.http, this.source.sitemapUrl);
    const promoUrls = urls.filter((url) => url.startsWith(this.source.urlPrefix));
    const selected = this.sampleSize === undefined ? promoUrls : promoUrls.slice(0, this.sampleSize);

    ctx.logger.info('Sitemap filtered', {
      listed: urls.length,
      matching: promoUrls.length,
      selected: selected.length,
    });

    return selected;
  }

  async fetchDetails(ctx: ScrapeContext, urls: string[]): Promise<PageDetail[]> {
    const details: PageDetail[] = [];

    for (const [index, url] of urls.entries()) {
      ctx.logger.info('Fetching promo page', { position: index + 1, total: urls.length, url });
      const detail = await fetchPageDetail(ctx, url, this.source.contentLocator);
      if (detail) details.push(detail);
    }

    return details;
  }

  normalize(ctx: ScrapeContext, details: PageDetail[]): UnifiedPromoRecord[] {
    return normalizeDetails(ctx, details);
  }
}
