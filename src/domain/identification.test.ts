/**
 * Unit tests for identification
 */

import { describe, it, expect } from 'vitest';
import { fromReferer, fromUserAgent, identificationHeader } from './identification.js';
import { NominatimError } from './error-handler.js';
import { catchError } from '../../tests/helpers.js';

describe('fromUserAgent', () => {
  it('should produce a User-Agent header with the value verbatim', () => {
    const method = fromUserAgent('Example Application Name');

    expect(identificationHeader(method)).toEqual(['User-Agent', 'Example Application Name']);
  });

  it('should keep surrounding whitespace and tabs', () => {
    const method = fromUserAgent(' my-app/2.0\t(contact@example.com) ');

    expect(identificationHeader(method)[1]).toBe(' my-app/2.0\t(contact@example.com) ');
  });

  it('should accept Latin-1 characters', () => {
    expect(identificationHeader(fromUserAgent('Café-app'))[1]).toBe('Café-app');
  });

  it('should reject control characters', () => {
    const error = catchError(() => fromUserAgent('bad\r\nX-Injected: 1'));

    expect(error).toBeInstanceOf(NominatimError);
    expect(error).toMatchObject({
      code: 'INVALID_HEADER_VALUE',
      details: { kind: 'user-agent' },
    });
  });

  it('should reject characters outside Latin-1', () => {
    expect(catchError(() => fromUserAgent('app 🚀'))).toMatchObject({
      code: 'INVALID_HEADER_VALUE',
    });
  });
});

describe('fromReferer', () => {
  it('should produce a Referer header with the value verbatim', () => {
    const method = fromReferer('https://example.com/map');

    expect(method.kind).toBe('referer');
    expect(identificationHeader(method)).toEqual(['Referer', 'https://example.com/map']);
  });

  it('should reject a NUL byte', () => {
    expect(catchError(() => fromReferer('https://example.com/\0'))).toMatchObject({
      code: 'INVALID_HEADER_VALUE',
      message: 'Invalid referer identification: Header value contains characters not allowed in HTTP headers',
    });
  });

  it('should be immutable', () => {
    const method = fromReferer('https://example.com/');

    expect(Object.isFrozen(method)).toBe(true);
  });
});
