/**
 * Error Classes Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('ScraperError', () => {
    it('should create error with message and code', () => {
      const error = new ScraperError('Test error', 'TEST_CODE');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toBeUndefined();
      expect(error.name).toBe('ScraperError');
    });

    it('should keep details and cause', () => {
      const cause = new Error('socket closed');
      const error = new ScraperError('Test error', 'TEST_CODE', { url: 'https://bank.example.test' }, cause);
      expect(error.details).toEqual({ url: 'https://bank.example.test' });
      expect(error.cause).toBe(cause);
    });
  });

  describe('TransportError family', () => {
    it('should carry the status on HttpStatusError', () => {
      const error = new HttpStatusError('HTTP 404', 404, { url: 'https://bank.example.test/x' });
      expect(error).toBeInstanceOf(TransportError);
      expect(error).toBeInstanceOf(ScraperError);
      expect(error.code).toBe('HTTP_STATUS_ERROR');
      expect(error.status).toBe(404);
      expect(error.details).toEqual({ url: 'https://bank.example.test/x', status: 404 });
    });

    it('should default the timeout message', () => {
      const error = new TransportTimeoutError();
      expect(error).toBeInstanceOf(TransportError);
      expect(error.message).toBe('Request timeout');
      expect(error.code).toBe('TRANSPORT_TIMEOUT');
    });

    it('should use TRANSPORT_ERROR for plain transport failures', () => {
      expect(new TransportError('reset').code).toBe('TRANSPORT_ERROR');
    });
  });

  describe('codes', () => {
    it.each([
      [new MalformedResponseError('x'), 'MALFORMED_RESPONSE'],
      [new AuthError('x'), 'AUTH_ERROR'],
      [new ExtractionError('x'), 'EXTRACTION_ERROR'],
      [new CatalogError('x'), 'CATALOG_ERROR'],
      [new RecordValidationError('x'), 'RECORD_VALIDATION_ERROR'],
      [new ConfigError('x'), 'CONFIG_ERROR'],
    ])('%s should have code %s', (error, code) => {
      expect(error).toBeInstanceOf(ScraperError);
      expect(error.code).toBe(code);
    });
  });

  describe('errorMessage', () => {
    it('should read Error messages and stringify anything else', () => {
      expect(errorMessage(new AuthError('no token'))).toBe('no token');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
