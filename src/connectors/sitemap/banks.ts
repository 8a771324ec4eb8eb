// src/connectors/sitemap/banks.ts

import type { SitemapSourceConfig } from './types';

export const BPI_SITEMAP: SitemapSourceConfig = {
  name: 'bpi',
  sitemapUrl: 'https://www.bpi.com.ph/sitemap.xml',
  urlPrefix: 'https://www.bpi.com.ph/personal/rewards-and-promotions/',
  contentLocator: 'main.container.responsivegrid.aem-GridColumn.aem-GridColumn--default--12',
};

export const EASTWEST_SITEMAP: SitemapSourceConfig = {
  name: 'eastwest',
  sitemapUrl: 'https://www.eastwestbanker.com/sitemap.xml',
  urlPrefix: 'https://www.eastwestbanker.com/promos/',
  contentLocator:
    '.block.block-system.block-system-main-block.block--ewb-theme-content.block--system-main',
  sampleSize: 3,
};
