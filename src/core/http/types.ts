// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequestConfig {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs?: number;
}

export type RequestOptions = Omit<HttpRequestConfig, 'url' | 'method' | 'body'>;

export interface HttpConfig {
  jsonTimeoutMs: number; // default 5000
  textTimeoutMs: number; // default 10000
  userAgent?: string;
}
