/**
 * Error handling for the Nominatim client
 */

import type { ErrorCode, ErrorDetails } from './types.js';
import { logger } from './logger.js';

/**
 * Error thrown by every client operation
 */
export class NominatimError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'NominatimError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Create a structured Nominatim error
 *
 * @param code - Error code
 * @param message - Human-readable error message
 * @param details - Additional error details
 */
export function createNominatimError(
  code: ErrorCode,
  message: string,
  details?: ErrorDetails
): NominatimError {
  return new NominatimError(code, message, details);
}

export function isNominatimError(error: unknown): error is NominatimError {
  return error instanceof NominatimError;
}

/**
 * Handle a non-2xx response from the server
 *
 * The body is not inspected; the status alone is reported.
 */
export function handleHttpError(
  status: number,
  statusText: string,
  url: string,
  requestId?: string
): NominatimError {
  logger.warn('HTTP error from Nominatim', {
    status,
    statusText,
    url,
    requestId,
  });

  return createNominatimError(
    'REQUEST_FAILED',
    `Nominatim responded with ${status} ${statusText}`.trim(),
    {
      reason: 'http_status',
      upstreamStatus: status,
      requestId,
    }
  );
}

/**
 * Handle network errors (connection refused, DNS, TLS)
 */
export function handleNetworkError(
  error: Error,
  url: string,
  requestId?: string
): NominatimError {
  logger.error('Network error calling Nominatim', {
    error: error.message,
    url,
    requestId,
  });

  return createNominatimError(
    'REQUEST_FAILED',
    `Unable to reach Nominatim: ${error.message}`,
    {
      reason: 'network',
      requestId,
      networkError: error.message,
    }
  );
}

/**
 * Handle expiry of the per-request timeout
 */
export function handleTimeoutError(
  timeout: number,
  url: string,
  requestId?: string
): NominatimError {
  logger.error('Nominatim request timed out', {
    timeout,
    url,
    requestId,
  });

  return createNominatimError(
    'REQUEST_FAILED',
    `Nominatim request timed out after ${timeout}ms`,
    {
      reason: 'timeout',
      requestId,
      timeout,
    }
  );
}

/**
 * Handle a body that is not JSON or does not match the expected shape
 */
export function handleDecodeError(
  problem: string,
  url: string,
  requestId?: string
): NominatimError {
  logger.error('Unexpected Nominatim response body', {
    problem,
    url,
    requestId,
  });

  return createNominatimError(
    'REQUEST_FAILED',
    `Unable to decode Nominatim response: ${problem}`,
    {
      reason: 'decode',
      requestId,
    }
  );
}
