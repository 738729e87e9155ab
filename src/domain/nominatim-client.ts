/**
 * HTTP client for a Nominatim geocoding server
 */

import type { z } from 'zod';
import type { Endpoint, Transport } from './types.js';
import {
  handleDecodeError,
  handleHttpError,
  handleNetworkError,
  handleTimeoutError,
  createNominatimError,
} from './error-handler.js';
import { identificationHeader, type IdentificationMethod } from './identification.js';
import { logger } from './logger.js';
import { buildQueryString, type QueryParams } from './query.js';
import { generateRequestId, getRequestId } from './request-context.js';
import {
  PlaceListSchema,
  PlaceSchema,
  StatusSchema,
  type Place,
  type Status,
} from '../places/schemas.js';

export const DEFAULT_BASE_URL = 'https://nominatim.openstreetmap.org/';
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Options for constructing a NominatimClient
 */
export interface NominatimClientOptions {
  /** Base URL every endpoint path is resolved against */
  baseUrl?: string | URL;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** fetch-compatible transport (default: global fetch) */
  transport?: Transport;
}

function parseBaseUrl(url: string | URL): URL {
  try {
    return new URL(url);
  } catch {
    throw createNominatimError('INVALID_URL', `Invalid base URL: ${String(url)}`, {
      url: String(url),
    });
  }
}

type JsonBody = { ok: true; value: unknown } | { ok: false; problem: string };

function parseJson(text: string): JsonBody {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, problem: error instanceof Error ? error.message : String(error) };
  }
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'response does not match the expected shape';
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Client for the status, search, reverse and lookup endpoints
 *
 * Each call is a single GET round trip. Nothing is cached or retried, and
 * callers using the public instance must keep to its usage policy
 * (at most one request per second) themselves.
 */
export class NominatimClient {
  private readonly identification: IdentificationMethod;
  private readonly transport: Transport;
  private base: URL;

  /** Request timeout in milliseconds, read at the start of every call */
  timeout: number;

  constructor(identification: IdentificationMethod, options: NominatimClientOptions = {}) {
    this.identification = identification;
    this.base = parseBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.transport = options.transport ?? ((input, init) => fetch(input, init));

    logger.debug('NominatimClient initialized', {
      baseUrl: this.base.href,
      timeout: this.timeout,
      identification: identification.kind,
    });
  }

  get baseUrl(): string {
    return this.base.href;
  }

  /**
   * Replace the base URL. Only well-formedness is checked, not reachability.
   *
   * @throws NominatimError (INVALID_URL); the previous base URL is kept
   */
  setBaseUrl(url: string | URL): void {
    this.base = parseBaseUrl(url);
  }

  /**
   * Check the health of the server. An unhealthy server still answers with
   * a Status (non-zero `status`), usually under HTTP 500.
   */
  async status(): Promise<Status> {
    const url = this.resolve('status.php', { format: 'json' });
    return this.get('status', url, StatusSchema);
  }

  /**
   * Geocode a free-text query. Results keep the server's order.
   *
   * @example
   * await client.search('statue of liberty');
   */
  async search(query: string): Promise<Place[]> {
    const url = this.resolve('', {
      addressdetails: 1,
      extratags: 1,
      q: query,
      format: 'json',
    });
    return this.get('search', url, PlaceListSchema);
  }

  /**
   * Find the place at a coordinate
   *
   * @param zoom - Address detail level, passed through unchecked (0-18 on the server)
   */
  async reverse(
    latitude: string | number,
    longitude: string | number,
    zoom?: number
  ): Promise<Place> {
    const url = this.resolve('reverse', {
      addressdetails: 1,
      extratags: 1,
      format: 'json',
      lat: String(latitude).replace(/ /g, ''),
      lon: String(longitude).replace(/ /g, ''),
      zoom,
    });
    return this.get('reverse', url, PlaceSchema);
  }

  /**
   * Look up places by OSM id, e.g. ['R146656', 'W50637691']
   *
   * Unknown ids are left out of the result by the server.
   */
  async lookup(osmIds: readonly string[]): Promise<Place[]> {
    const url = this.resolve('lookup', {
      osm_ids: osmIds.join(','),
      addressdetails: 1,
      extratags: 1,
      format: 'json',
    });
    return this.get('lookup', url, PlaceListSchema);
  }

  private resolve(path: string, params: QueryParams): string {
    const url = new URL(path, this.base);
    url.search = buildQueryString(params);
    url.hash = '';
    return url.href;
  }

  private async get<T>(
    endpoint: Endpoint,
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const requestId = getRequestId() ?? generateRequestId();
    const timeout = this.timeout;
    const [headerName, headerValue] = identificationHeader(this.identification);
    const startTime = Date.now();

    logger.logRequestStart(endpoint, url, requestId);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    let text: string;
    try {
      response = await this.transport(url, {
        method: 'GET',
        headers: { [headerName]: headerValue },
        signal: controller.signal,
      });
      text = await response.text();

      logger.logRequestEnd(endpoint, url, response.status, Date.now() - startTime, requestId);
    } catch (error) {
      // An abort while the body streams in is a timeout too
      if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
        throw handleTimeoutError(timeout, url, requestId);
      }
      throw handleNetworkError(
        error instanceof Error ? error : new Error(String(error)),
        url,
        requestId
      );
    } finally {
      clearTimeout(timeoutId);
    }

    // The status code only matters when the body is unusable
    const body = parseJson(text);
    let problem: string;
    if (body.ok) {
      const parsed = schema.safeParse(body.value);
      if (parsed.success) {
        return parsed.data;
      }
      problem = describeIssue(parsed.error);
    } else {
      problem = body.problem;
    }

    if (!response.ok) {
      throw handleHttpError(response.status, response.statusText, url, requestId);
    }
    throw handleDecodeError(problem, url, requestId);
  }
}
