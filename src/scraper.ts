// src/scraper.ts

import { v4 as uuidv4 } from 'uuid';
import { SOURCE_NAMES } from './core/normalizer/types';
import type { SourceName, UnifiedPromoRecord } from './core/normalizer/types';
import type { Connector, ConnectorRegistry, ScrapeContext } from './connectors/types';
import { createConnectorRegistry } from './connectors';
import { HttpCore } from './core/http/HttpCore';
import { Normalizer, formatCaptureDate } from './core/normalizer/Normalizer';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { withScrapeSpan } from './observability/tracing';
import { Throttle, defaultSleep, type Sleeper } from './utils/throttle';
import { ConfigError, ScraperError, errorMessage } from './utils/errors';
import { validateConfigSafe, type InitConfig, type ResolvedConfig } from './config/ConfigValidator';

/**
 * Process-level hooks, replaced in tests
 */
export interface ScraperRuntime {
  sleep?: Sleeper;
  random?: () => number;
  now?: () => Date;
  generateRunId?: () => string;
}

interface CoreDeps {
  logger: Logger;
  metrics: MetricsCollector;
  normalizer: Normalizer;
  connectors: ConnectorRegistry;
}

export class PromoScraper {
  private core: CoreDeps;
  private runtime: Required<ScraperRuntime>;

  private constructor(
    private config: ResolvedConfig,
    runtime: ScraperRuntime
  ) {
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics);
    const normalizer = new Normalizer();
    const connectors = createConnectorRegistry(config.sources);

    this.core = { logger, metrics, normalizer, connectors };
    this.runtime = {
      sleep: runtime.sleep ?? defaultSleep,
      random: runtime.random ?? Math.random,
      now: runtime.now ?? (() => new Date()),
      generateRunId: runtime.generateRunId ?? (() => uuidv4()),
    };
  }

  /**
   * Validate configuration and build the scraper
   *
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const scraper = await PromoScraper.init({
   *   logging: { level: 'info' },
   *   sources: { bdo: { identifier: process.env.BDO_CLIENT_IDENTIFIER } },
   * });
   * const promos = await scraper.scrape('eastwest');
   * ```
   */
  static async init(config: InitConfig = {}, runtime: ScraperRuntime = {}): Promise<PromoScraper> {
    const result = validateConfigSafe(config);
    if (!result.success) {
      throw new ConfigError('Invalid scraper configuration', { issues: result.errors });
    }

    const scraper = new PromoScraper(result.data, runtime);
    scraper.core.logger.info('Scraper initialized', { sources: scraper.sources() });
    return scraper;
  }

  /**
   * Names accepted by scrape()
   */
  sources(): SourceName[] {
    return [...SOURCE_NAMES];
  }

  /**
   * Run one source end to end: discovery, detail retrieval, normalization.
   *
   * Every record of the returned list carries the same fresh run id. Session
   * failures (credentials, catalog, sitemap) reject the promise; failures of a
   * single page or item are logged and skipped.
   *
   * @throws {ConfigError} If `source` is not a registered source
   */
  async scrape(source: string): Promise<UnifiedPromoRecord[]> {
    const name = this.resolveSource(source);
    const connector: Connector<unknown> = this.core.connectors[name];

    const runId = this.runtime.generateRunId();
    const logger = this.core.logger.child({ runId, source: name });

    return withScrapeSpan(name, runId, async (span) => {
      const ctx: ScrapeContext = {
        runId,
        capturedOn: formatCaptureDate(this.runtime.now()),
        source: name,
        http: new HttpCore(name, this.config.http, this.core.metrics, logger),
        normalizer: this.core.normalizer,
        throttle: new Throttle(this.config.throttle, this.runtime.sleep, this.runtime.random),
        logger,
        metrics: this.core.metrics,
      };

      const startTime = Date.now();
      logger.info('Scrape started', { capturedOn: ctx.capturedOn });

      try {
        const catalog = await connector.discover(ctx);
        const details = await connector.fetchDetails(ctx, catalog);
        const records = connector.normalize(ctx, details);

        const durationMs = Date.now() - startTime;
        this.core.metrics.incrementCounter('scrape_runs', { source: name, status: 'success' });
        this.core.metrics.recordLatency('scrape_duration', durationMs, { source: name, status: 'success' });
        this.core.metrics.incrementCounter('records_emitted', { source: name }, records.length);
        span?.setAttribute('scrape.records', records.length);

        logger.info('Scrape completed', { records: records.length, durationMs });
        return records;
      } catch (error: unknown) {
        const durationMs = Date.now() - startTime;
        this.core.metrics.incrementCounter('scrape_runs', { source: name, status: 'failure' });
        this.core.metrics.recordLatency('scrape_duration', durationMs, { source: name, status: 'failure' });

        logger.error('Scrape failed', {
          code: error instanceof ScraperError ? error.code : 'UNKNOWN',
          error: errorMessage(error),
          durationMs,
        });
        throw error;
      }
    });
  }

  /**
   * Prometheus exposition text of this scraper's metrics registry
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  private resolveSource(source: string): SourceName {
    const name = SOURCE_NAMES.find((candidate) => candidate === source);
    if (!name) {
      throw new ConfigError(`Unknown source: ${source}`, { source, available: this.sources() });
    }
    return name;
  }
}
