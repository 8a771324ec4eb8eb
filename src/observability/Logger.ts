// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const REDACTED_KEYS = new Set(['authorization', 'bearer_token', 'bearertoken', 'identifier']);

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}, base?: winston.Logger) {
    if (base) {
      this.logger = base;
      return;
    }

    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      // stdout stays free for scraped output
      transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
    });
  }

  /**
   * Logger that stamps `meta` (e.g. runId, source) on every line it writes
   */
  child(meta: Record<string, unknown>): Logger {
    return new Logger({}, this.logger.child(this.redactSensitive(meta)));
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = { ...obj };

    for (const key of Object.keys(redacted)) {
      if (REDACTED_KEYS.has(key.toLowerCase())) {
        redacted[key] = '[REDACTED]';
      }
    }

    // Request headers carry the bearer token
    const headers = redacted.headers;
    if (headers && typeof headers === 'object' && !Array.isArray(headers)) {
      redacted.headers = this.redactSensitive({ ...headers });
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
