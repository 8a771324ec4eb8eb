// src/index.ts

export { PromoScraper } from './scraper';
export type { ScraperRuntime } from './scraper';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { InitConfig, ResolvedConfig } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';
export { PromoRecordSchema, formatCaptureDate } from './core/normalizer/Normalizer';
export { SOURCE_NAMES } from './core/normalizer/types';
export type { SourceName, UnifiedPromoRecord } from './core/normalizer/types';
export { extractText, extractLinks, htmlToText } from './core/html/HtmlExtractor';
export { parseSitemap, readSitemap } from './core/sitemap/SitemapReader';
export { createConnectorRegistry } from './connectors';
export type { Connector, ScrapeContext } from './connectors';

// Export error classes for error handling
export {
  ScraperError,
  TransportError,
  HttpStatusError,
  TransportTimeoutError,
  MalformedResponseError,
  AuthError,
  ExtractionError,
  CatalogError,
  RecordValidationError,
  ConfigError,
  errorMessage,
} from './utils/errors';
