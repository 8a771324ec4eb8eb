// src/connectors/chinabank/ChinabankConnector.ts

import type { Connector, ScrapeContext } from '../types';
import type { PageDetail, UnifiedPromoRecord } from '../../core/normalizer/types';
import { extractLinks } from '../../core/html/HtmlExtractor';
import { fetchPageDetail, normalizeDetails, skipItem } from '../shared';

export const CHINABANK_ORIGIN = 'https://www.chinabank.ph';

export const CATEGORY_PATHS = [
  'credit-card-promos-more',
  'credit-card-promos-beauty-wellness',
  'credit-cards-promos-travel',
  'credit-cards-promos-stay',
  'credit-cards-promos-installment',
  'credit-cards-promos-ecom',
  'credit-cards-promos-shop',
  'credit-cards-promos-dine',
  'credit-cards-promos-premium',
  'credit-cards-promos-member-get-member',
] as const;

const LINK_CONTAINER = 'div#gallery-list';
const ARTICLE_LOCATOR = 'div#article-detail';

/**
 * Chinabank promo connector
 *
 * Crawls a fixed set of category landing pages, collects the promo links of
 * each gallery and extracts the article body of every linked page.
 */
export class ChinabankConnector implements Connector<string[], PageDetail> {
  readonly name = 'chinabank' as const;

  constructor(
    private categoryUrls: readonly string[] = CATEGORY_PATHS.map((path) => `${CHINABANK_ORIGIN}/${path}`)
  ) {}

  async discover(ctx: ScrapeContext): Promise<string[]> {
    const links: string[] = [];

    for (const [index, categoryUrl] of this.categoryUrls.entries()) {
      ctx.logger.info('Loading category page', {
        position: index + 1,
        total: this.categoryUrls.length,
        url: categoryUrl,
      });

      try {
        const html = await ctx.http.getText(categoryUrl);
        const categoryLinks = extractLinks(html, LINK_CONTAINER, categoryUrl);
        ctx.logger.info('Found promo links in category', { url: categoryUrl, count: categoryLinks.length });
        links.push(...categoryLinks);
      } catch (error: unknown) {
        skipItem(ctx, 'category', 'Skipping category page', { url: categoryUrl, error });
      }
    }

    return links;
  }

  async fetchDetails(ctx: ScrapeContext, links: string[]): Promise<PageDetail[]> {
    const details: PageDetail[] = [];

    for (const link of links) {
      const detail = await fetchPageDetail(ctx, link, ARTICLE_LOCATOR);
      if (detail) details.push(detail);
    }

    ctx.logger.info('Promo pages extracted', { links: links.length, extracted: details.length });
    return details;
  }

  normalize(ctx: ScrapeContext, details: PageDetail[]): UnifiedPromoRecord[] {
    return normalizeDetails(ctx, details);
  }
}
