// src/connectors/index.ts

import type { ConnectorRegistry } from './types';
import type { BdoConnectorOptions } from './bdo/types';
import type { SitemapConnectorOptions } from './sitemap/types';
import { BdoConnector } from './bdo/BdoConnector';
import { SitemapConnector } from './sitemap/SitemapConnector';
import { BPI_SITEMAP, EASTWEST_SITEMAP } from './sitemap/banks';
import { ChinabankConnector } from './chinabank/ChinabankConnector';

export interface SourcesConfig {
  bdo: BdoConnectorOptions;
  bpi: SitemapConnectorOptions;
  eastwest: SitemapConnectorOptions;
}

/**
 * Source name to connector dispatch table
 */
export function createConnectorRegistry(sources: SourcesConfig): ConnectorRegistry {
  return {
    bdo: new BdoConnector(sources.bdo),
    bpi: new SitemapConnector(BPI_SITEMAP, sources.bpi),
    eastwest: new SitemapConnector(EASTWEST_SITEMAP, sources.eastwest),
    chinabank: new ChinabankConnector(),
  };
}

export { BdoConnector } from './bdo/BdoConnector';
export { SitemapConnector } from './sitemap/SitemapConnector';
export { ChinabankConnector } from './chinabank/ChinabankConnector';
export { BPI_SITEMAP, EASTWEST_SITEMAP } from './sitemap/banks';
export type { Connector, ConnectorRegistry, ScrapeContext, SkipStage } from './types';
