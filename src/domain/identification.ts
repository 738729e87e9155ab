/**
 * How a client identifies itself to a Nominatim server
 *
 * The public instance's usage policy requires either a User-Agent naming
 * the application or a Referer. Exactly one is sent with every request.
 */

import { z } from 'zod';
import { createNominatimError } from './error-handler.js';

export type IdentificationMethod =
  | { readonly kind: 'user-agent'; readonly value: string }
  | { readonly kind: 'referer'; readonly value: string };

export type IdentificationHeaderName = 'User-Agent' | 'Referer';

/** HTAB, SP, visible ASCII and obs-text */
const HEADER_VALUE_PATTERN = /^[\t\x20-\x7e\x80-\xff]*$/;

export const HeaderValueSchema = z
  .string()
  .regex(HEADER_VALUE_PATTERN, 'Header value contains characters not allowed in HTTP headers');

function validated(
  kind: IdentificationMethod['kind'],
  value: string
): IdentificationMethod {
  const result = HeaderValueSchema.safeParse(value);
  if (!result.success) {
    throw createNominatimError(
      'INVALID_HEADER_VALUE',
      `Invalid ${kind} identification: ${result.error.issues[0]?.message ?? 'invalid value'}`,
      { kind }
    );
  }
  return Object.freeze({ kind, value: result.data });
}

/**
 * Identify with an application name sent as the User-Agent header
 *
 * @throws NominatimError (INVALID_HEADER_VALUE) for control characters
 */
export function fromUserAgent(userAgent: string): IdentificationMethod {
  return validated('user-agent', userAgent);
}

/**
 * Identify with a URL sent as the Referer header
 *
 * @throws NominatimError (INVALID_HEADER_VALUE) for control characters
 */
export function fromReferer(referer: string): IdentificationMethod {
  return validated('referer', referer);
}

/**
 * Header name and value for an identification method
 */
export function identificationHeader(
  method: IdentificationMethod
): [IdentificationHeaderName, string] {
  switch (method.kind) {
    case 'user-agent':
      return ['User-Agent', method.value];
    case 'referer':
      return ['Referer', method.value];
  }
}
