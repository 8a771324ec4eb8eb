// src/connectors/sitemap/types.ts

import type { SourceName } from '../../core/normalizer/types';

/**
 * A bank whose promo pages are listed in its sitemap under a common prefix
 */
export interface SitemapSourceConfig {
  name: SourceName;
  sitemapUrl: string;
  urlPrefix: string;
  contentLocator: string;            // CSS selector of the promo body
  sampleSize?: number;               // Keep only the first N matching URLs
}

export interface SitemapConnectorOptions {
  sampleSize?: number;               // Overrides the bank default when set
}
