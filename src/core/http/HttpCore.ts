// src/core/http/HttpCore.ts

import axios, { type AxiosInstance } from 'axios';
import type { HttpConfig, HttpMethod, HttpRequestConfig, RequestOptions } from './types';
import type { SourceName } from '../normalizer/types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  HttpStatusError,
  MalformedResponseError,
  TransportError,
  TransportTimeoutError,
  errorMessage,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36';
const JSON_ACCEPT = 'application/json, text/plain, */*';
const TEXT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const DEFAULT_CHARSET = 'utf-8';
const CHARSET_PATTERN = /charset\s*=\s*"?([^";\s]+)"?/i;

type BodyKind = 'json' | 'text';

/**
 * Single-attempt HTTP primitives for one scrape invocation.
 *
 * Failures surface as TransportError (network, timeout, non-2xx) or
 * MalformedResponseError (body is not the JSON the caller asked for). Nothing
 * is retried here; callers decide whether a failure aborts the run or skips
 * one item.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;

  constructor(
    private source: SourceName,
    private config: HttpConfig,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.axiosInstance = axios.create({
      // Raw bytes: decoding follows the response charset, JSON parsing happens in fetchJson
      responseType: 'arraybuffer',
      transformResponse: [(data: unknown) => data],
      validateStatus: (status) => status >= 200 && status < 300,
    });
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.fetchJson({ ...options, url, method: 'GET' });
  }

  async postJson(url: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    return this.fetchJson({ ...options, url, method: 'POST', body });
  }

  async fetchJson(config: HttpRequestConfig): Promise<unknown> {
    const raw = await this.request(config, 'json');

    if (!raw.trim()) {
      this.logger.error('Empty response body where JSON was expected', { url: config.url });
      throw new MalformedResponseError('Response body is empty', { url: config.url });
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (error: unknown) {
      this.logger.error('Failed to decode JSON from response', {
        url: config.url,
        error: errorMessage(error),
      });
      throw new MalformedResponseError('Response content is not valid JSON', { url: config.url }, error);
    }
  }

  /**
   * Raw body of a GET request (HTML pages, sitemaps)
   */
  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    return this.request({ ...options, url, method: 'GET' }, 'text');
  }

  private async request(config: HttpRequestConfig, kind: BodyKind): Promise<string> {
    const method: HttpMethod = config.method ?? 'GET';
    const timeoutMs =
      config.timeoutMs ?? (kind === 'json' ? this.config.jsonTimeoutMs : this.config.textTimeoutMs);

    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent ?? DEFAULT_USER_AGENT,
      Accept: kind === 'json' ? JSON_ACCEPT : TEXT_ACCEPT,
      ...(config.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...config.headers,
    };

    this.logger.debug('HTTP request', {
      method,
      url: config.url,
      timeoutMs,
      headerKeys: Object.keys(headers),
    });

    return withHttpSpan(method, config.url, async () => {
      const startTime = Date.now();

      try {
        const response = await this.axiosInstance.request<ArrayBuffer | undefined>({
          url: config.url,
          method,
          headers,
          data: config.body,
          timeout: timeoutMs,
        });

        const durationMs = Date.now() - startTime;
        this.metrics.incrementCounter('http_requests_total', {
          source: this.source,
          method,
          status: response.status,
        });
        this.metrics.recordLatency('http_request_duration', durationMs, {
          source: this.source,
          status: response.status,
        });
        this.logger.info('HTTP response', {
          method,
          url: config.url,
          status: response.status,
          durationMs,
        });

        return this.decodeBody(response.data, response.headers['content-type'], config.url);
      } catch (error: unknown) {
        const transportError = this.transformError(error, method, config.url, timeoutMs);
        const status = transportError instanceof HttpStatusError ? transportError.status : 'error';

        this.metrics.incrementCounter('http_requests_total', {
          source: this.source,
          method,
          status,
        });
        this.metrics.incrementCounter('http_errors', {
          source: this.source,
          kind: transportError.code,
        });
        this.logger.error('HTTP request failed', {
          method,
          url: config.url,
          code: transportError.code,
          error: transportError.message,
        });

        throw transportError;
      }
    });
  }

  private decodeBody(data: ArrayBuffer | undefined, contentType: unknown, url: string): string {
    if (!data) {
      return '';
    }

    const match = typeof contentType === 'string' ? CHARSET_PATTERN.exec(contentType) : null;
    const charset = match?.[1] ?? DEFAULT_CHARSET;

    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(charset);
    } catch (error: unknown) {
      this.logger.warn('Unknown response charset, decoding as UTF-8', {
        url,
        charset,
        error: errorMessage(error),
      });
      decoder = new TextDecoder(DEFAULT_CHARSET);
    }

    return decoder.decode(data);
  }

  private transformError(
    error: unknown,
    method: HttpMethod,
    url: string,
    timeoutMs: number
  ): TransportError {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        return new HttpStatusError(
          `HTTP ${status} for ${method} ${url}`,
          status,
          { url, method, statusText: error.response.statusText },
          error
        );
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TransportTimeoutError(
          `Request timed out after ${timeoutMs} ms`,
          { url, method, timeoutMs },
          error
        );
      }
      return new TransportError(`Request failed: ${error.message}`, { url, method, code: error.code }, error);
    }
    return new TransportError(`Request failed: ${errorMessage(error)}`, { url, method }, error);
  }
}
