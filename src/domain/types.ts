/**
 * Common types for the Nominatim client
 */

/**
 * Error codes raised by the client
 */
export type ErrorCode =
  | 'INVALID_URL'
  | 'INVALID_HEADER_VALUE'
  | 'REQUEST_FAILED';

/**
 * Why a request failed. Informational only: every reason surfaces
 * under the same REQUEST_FAILED code.
 */
export type FailureReason = 'network' | 'timeout' | 'http_status' | 'decode';

export interface ErrorDetails {
  reason?: FailureReason;
  upstreamStatus?: number;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * The four endpoints exposed by a Nominatim server
 */
export type Endpoint = 'status' | 'search' | 'reverse' | 'lookup';

/**
 * Transport handle used for every request (fetch-compatible)
 */
export type Transport = (input: string, init: RequestInit) => Promise<Response>;
