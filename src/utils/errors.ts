// src/utils/errors.ts

export class ScraperError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Transport errors
export class TransportError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', details, cause);
  }
}

export class HttpStatusError extends TransportError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, { ...details, status }, cause);
    this.code = 'HTTP_STATUS_ERROR';
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>, cause?: unknown) {
    super(message, details, cause);
    this.code = 'TRANSPORT_TIMEOUT';
  }
}

// Payload errors
export class MalformedResponseError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'MALFORMED_RESPONSE', details, cause);
  }
}

export class AuthError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'AUTH_ERROR', details, cause);
  }
}

export class ExtractionError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXTRACTION_ERROR', details);
  }
}

export class CatalogError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CATALOG_ERROR', details);
  }
}

export class RecordValidationError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'RECORD_VALIDATION_ERROR', details, cause);
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Message of an unknown thrown value, for log metadata.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
