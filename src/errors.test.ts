/**
 * Tests for error utilities
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  RemoteApplicationError,
  ResponseParseError,
  TransportError,
  ValidationError,
  generateCorrelationId,
  getErrorDetails,
  isMCPError,
  toError,
} from './errors.js';

describe('generateCorrelationId', () => {
  it('should generate a valid UUID v4 format', () => {
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
    expect(generateCorrelationId()).toMatch(uuidRegex);
  });

  it('should generate unique IDs', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 100; i++) {
      ids.add(generateCorrelationId());
    }
    expect(ids.size).toBe(100);
  });
});

describe('error classes', () => {
  it('carry machine-readable codes', () => {
    expect(new ValidationError('bad').code).toBe('VALIDATION_ERROR');
    expect(new ConfigurationError('bad').code).toBe('CONFIGURATION_ERROR');
    expect(new TransportError('bad', 502).code).toBe('TRANSPORT_ERROR');
    expect(new RemoteApplicationError('bad', { message: 'bad' }).code).toBe('REMOTE_APPLICATION_ERROR');
    expect(new ResponseParseError('bad', '<html>').code).toBe('RESPONSE_PARSE_ERROR');
  });

  it('keep the status code in details', () => {
    expect(new TransportError('HTTP error 502', 502).details).toEqual({ statusCode: 502 });
  });

  it('keep the remote payload and raw text', () => {
    expect(new RemoteApplicationError('API error: boom', { message: 'boom' }, 500).payload).toEqual({ message: 'boom' });
    expect(new ResponseParseError('Failed to parse response', 'not json').rawResponse).toBe('not json');
  });

  it('are recognized by isMCPError', () => {
    expect(isMCPError(new ValidationError('bad'))).toBe(true);
    expect(isMCPError(new Error('plain'))).toBe(false);
    expect(isMCPError('string')).toBe(false);
  });
});

describe('getErrorDetails', () => {
  it('includes code and details for MCP errors', () => {
    const details = getErrorDetails(new ValidationError('Missing required parameters: name', { missing: ['name'] }));
    expect(details).toMatchObject({
      name: 'ValidationError',
      code: 'VALIDATION_ERROR',
      message: 'Missing required parameters: name',
      details: { missing: ['name'] },
    });
  });

  it('handles plain errors and thrown values', () => {
    expect(getErrorDetails(new TypeError('nope'))).toMatchObject({ name: 'TypeError', message: 'nope' });
    expect(getErrorDetails(42)).toEqual({ message: '42' });
  });
});

describe('toError', () => {
  it('wraps non-Error values', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
    expect(toError('text').message).toBe('text');
  });
});
