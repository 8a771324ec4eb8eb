// src/connectors/bdo/BdoConnector.ts

import type { Connector, ScrapeContext } from '../types';
import type { BdoCampaignDetail, BdoRewardDetail, UnifiedPromoRecord } from '../../core/normalizer/types';
import {
  AccordionSchema,
  AdditionalSectionSchema,
  CampaignResponseSchema,
  CatalogItemSchema,
  CategoriesResponseSchema,
  CategorySchema,
  ItemsPageSchema,
  RewardResponseSchema,
  TokenResponseSchema,
  TotalPagesSchema,
  type BdoCatalog,
  type BdoConnectorOptions,
  type CatalogItemRef,
} from './types';
import { normalizeDetails, skipItem } from '../shared';
import { AuthError, CatalogError, ConfigError } from '../../utils/errors';

export const DEALS_ORIGIN = 'https://www.deals.bdo.com.ph';
export const TOKEN_URL = `${DEALS_ORIGIN}/v4/oauth/token`;
export const API_BASE = 'https://api.perxtech.net/v4';

const CAMPAIGN_TYPE = 'Campaign';
const REWARD_TYPE = 'Reward::Campaign';

// The token endpoint only answers requests that look like they come from the deals site
const SITE_HEADERS: Record<string, string> = {
  Origin: DEALS_ORIGIN,
  Referer: DEALS_ORIGIN,
};

export type BdoDetail = BdoCampaignDetail | BdoRewardDetail;

/**
 * BDO deals catalog connector
 *
 * Authenticates against the deals site, walks every category of the rewards
 * catalog page by page, then fetches campaign and reward details one at a
 * time. Campaign records come before reward records.
 *
 * @example
 * ```typescript
 * const scraper = await PromoScraper.init({ sources: { bdo: { identifier: 'test-identifier' } } });
 * const records = await scraper.scrape('bdo');
 * ```
 */
export class BdoConnector implements Connector<BdoCatalog, BdoDetail> {
  readonly name = 'bdo' as const;

  constructor(private options: BdoConnectorOptions) {}

  async discover(ctx: ScrapeContext): Promise<BdoCatalog> {
    const headers = await this.authenticate(ctx);
    const categoryIds = await this.fetchCategories(ctx, headers);

    const items: CatalogItemRef[] = [];
    for (const categoryId of categoryIds) {
      items.push(...(await this.fetchCategoryItems(ctx, headers, categoryId)));
    }

    const campaigns: CatalogItemRef[] = [];
    const rewards: CatalogItemRef[] = [];

    for (const item of items) {
      if (item.itemType === CAMPAIGN_TYPE) {
        campaigns.push(item);
      } else if (item.itemType === REWARD_TYPE) {
        rewards.push(item);
      } else {
        ctx.logger.debug('Ignoring catalog item of unhandled type', { ...item });
      }
    }

    ctx.logger.info('Catalog discovered', {
      categories: categoryIds.length,
      campaigns: campaigns.length,
      rewards: rewards.length,
    });

    return { headers, campaigns, rewards };
  }

  async fetchDetails(ctx: ScrapeContext, catalog: BdoCatalog): Promise<BdoDetail[]> {
    const details: BdoDetail[] = [];

    for (const ref of catalog.campaigns) {
      const detail = await this.fetchCampaign(ctx, catalog.headers, ref);
      if (detail) details.push(detail);
    }

    for (const ref of catalog.rewards) {
      const detail = await this.fetchReward(ctx, catalog.headers, ref);
      if (detail) details.push(detail);
    }

    ctx.logger.info('Fetched catalog details', {
      requested: catalog.campaigns.length + catalog.rewards.length,
      fetched: details.length,
    });

    return details;
  }

  normalize(ctx: ScrapeContext, details: BdoDetail[]): UnifiedPromoRecord[] {
    return normalizeDetails(ctx, details);
  }

  /**
   * Exchange the client identifier for a bearer token and build the header
   * set used by every catalog call of this run
   */
  private async authenticate(ctx: ScrapeContext): Promise<Record<string, string>> {
    const identifier = this.options.identifier;
    if (!identifier) {
      throw new ConfigError('BDO client identifier is not configured', {
        setting: 'sources.bdo.identifier',
      });
    }

    let response: unknown;
    try {
      response = await ctx.http.postJson(
        TOKEN_URL,
        { url: new URL(DEALS_ORIGIN).host, identifier },
        { headers: SITE_HEADERS }
      );
    } catch (error: unknown) {
      throw new AuthError('Bearer token request failed', { url: TOKEN_URL }, error);
    }

    const parsed = TokenResponseSchema.safeParse(response);
    const token = parsed.success ? parsed.data.bearer_token : undefined;

    if (!token) {
      throw new AuthError('Token response has no bearer_token', { url: TOKEN_URL });
    }

    ctx.logger.info('Retrieved bearer token');

    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${token}`,
      ...SITE_HEADERS,
    };
  }

  private async fetchCategories(ctx: ScrapeContext, headers: Record<string, string>): Promise<string[]> {
    const url = `${API_BASE}/categories`;
    const response = await ctx.http.getJson(url, { headers });

    const parsed = CategoriesResponseSchema.safeParse(response);
    const entries = parsed.success ? parsed.data.data ?? [] : [];

    const ids = entries.flatMap((entry) => {
      const category = CategorySchema.safeParse(entry);
      return category.success ? [category.data.id] : [];
    });

    if (ids.length === 0) {
      throw new CatalogError('No category ids in categories response', { url });
    }

    ctx.logger.info('Category ids retrieved', { count: ids.length });
    return ids;
  }

  /**
   * Item references of one category. Page 1 also tells how many pages exist,
   * so a category of N pages costs exactly N requests.
   */
  private async fetchCategoryItems(
    ctx: ScrapeContext,
    headers: Record<string, string>,
    categoryId: string
  ): Promise<CatalogItemRef[]> {
    let firstPage: unknown;
    try {
      firstPage = await this.requestPage(ctx, headers, categoryId, 1);
    } catch (error: unknown) {
      skipItem(ctx, 'category', 'Skipping category, first page failed', { categoryId, error });
      return [];
    }

    const first = ItemsPageSchema.safeParse(firstPage);
    const totalPages = TotalPagesSchema.safeParse(first.success ? first.data.meta?.total_pages : undefined);

    if (!first.success || !totalPages.success) {
      skipItem(ctx, 'category', 'Skipping category, total_pages missing or invalid', { categoryId });
      return [];
    }

    ctx.logger.info('Extracting category pages', { categoryId, totalPages: totalPages.data });

    if (totalPages.data === 0) {
      return [];
    }

    const items = this.collectItems(first.data.data);
    ctx.logger.info('Retrieved items from page', { categoryId, page: 1, count: items.length });

    for (let page = 2; page <= totalPages.data; page++) {
      let pageBody: unknown;
      try {
        pageBody = await this.requestPage(ctx, headers, categoryId, page);
      } catch (error: unknown) {
        skipItem(ctx, 'page', 'Skipping catalog page', { categoryId, page, error });
        continue;
      }

      const parsed = ItemsPageSchema.safeParse(pageBody);
      if (!parsed.success) {
        skipItem(ctx, 'page', 'Skipping catalog page with unexpected shape', { categoryId, page });
        continue;
      }

      const pageItems = this.collectItems(parsed.data.data);
      ctx.logger.info('Retrieved items from page', { categoryId, page, count: pageItems.length });
      items.push(...pageItems);
    }

    return items;
  }

  private async requestPage(
    ctx: ScrapeContext,
    headers: Record<string, string>,
    categoryId: string,
    page: number
  ): Promise<unknown> {
    const { catalogId, pageSize } = this.options;
    const query = new URLSearchParams({
      page: String(page),
      size: String(pageSize),
      category_ids: categoryId,
    });

    try {
      return await ctx.http.getJson(`${API_BASE}/catalogs/${catalogId}/items?${query.toString()}`, {
        headers,
      });
    } finally {
      await ctx.throttle.pause();
    }
  }

  private collectItems(entries: unknown[] | null | undefined): CatalogItemRef[] {
    return (entries ?? []).flatMap((entry) => {
      const item = CatalogItemSchema.safeParse(entry);
      return item.success ? [{ itemType: item.data.item_type, itemId: item.data.item_id }] : [];
    });
  }

  private async fetchCampaign(
    ctx: ScrapeContext,
    headers: Record<string, string>,
    ref: CatalogItemRef
  ): Promise<BdoCampaignDetail | undefined> {
    const body = await this.fetchDetail(ctx, headers, 'campaigns', ref);
    if (body === undefined) return undefined;

    const parsed = CampaignResponseSchema.safeParse(body);
    if (!parsed.success) {
      skipItem(ctx, 'detail', 'Skipping campaign with unexpected shape', { itemId: ref.itemId });
      return undefined;
    }

    const { name, display_properties: display } = parsed.data.data;
    const landing = display?.landing_page;

    const additionalSections = (landing?.additional_sections ?? []).flatMap((section) => {
      const entry = AdditionalSectionSchema.safeParse(section);
      return entry.success ? [entry.data.body_text ?? ''] : [];
    });

    return {
      kind: 'bdo-campaign',
      id: ref.itemId,
      url: `${DEALS_ORIGIN}/treat-welcome/${encodeURIComponent(ref.itemId)}`,
      name: name ?? '',
      headline: landing?.headline ?? '',
      subHeadline: landing?.sub_headline ?? '',
      bodyText: landing?.body_text ?? '',
      enrolmentBodyText: display?.enrolment_page?.body_text ?? '',
      additionalSections,
    };
  }

  private async fetchReward(
    ctx: ScrapeContext,
    headers: Record<string, string>,
    ref: CatalogItemRef
  ): Promise<BdoRewardDetail | undefined> {
    const body = await this.fetchDetail(ctx, headers, 'rewards', ref);
    if (body === undefined) return undefined;

    const parsed = RewardResponseSchema.safeParse(body);
    if (!parsed.success) {
      skipItem(ctx, 'detail', 'Skipping reward with unexpected shape', { itemId: ref.itemId });
      return undefined;
    }

    const { name, description, accordions } = parsed.data.data;

    return {
      kind: 'bdo-reward',
      id: ref.itemId,
      url: `${DEALS_ORIGIN}/rewards/${encodeURIComponent(ref.itemId)}`,
      name: name ?? '',
      description: description ?? '',
      // null or non-object entries keep their slot as an empty accordion
      accordions: (accordions ?? []).map((accordion) => {
        const entry = AccordionSchema.safeParse(accordion);
        return entry.success
          ? { title: entry.data.title ?? '', body: entry.data.body ?? '' }
          : { title: '', body: '' };
      }),
    };
  }

  /**
   * Raw detail payload, or undefined once the failure has been logged
   */
  private async fetchDetail(
    ctx: ScrapeContext,
    headers: Record<string, string>,
    resource: 'campaigns' | 'rewards',
    ref: CatalogItemRef
  ): Promise<unknown> {
    const url = `${API_BASE}/${resource}/${encodeURIComponent(ref.itemId)}`;

    let body: unknown;
    try {
      body = await ctx.http.getJson(url, { headers });
    } catch (error: unknown) {
      skipItem(ctx, 'detail', 'Failed to fetch catalog detail', { resource, itemId: ref.itemId, error });
      return undefined;
    }

    await ctx.throttle.pause();
    return body;
  }
}
