/**
 * Nominatim client
 * Entry point for the package
 */

import { loadConfig, type ClientConfig } from './config/env.js';
import { fromReferer, fromUserAgent } from './domain/identification.js';
import { logger } from './domain/logger.js';
import { NominatimClient } from './domain/nominatim-client.js';

export {
  NominatimClient,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type NominatimClientOptions,
} from './domain/nominatim-client.js';
export {
  fromUserAgent,
  fromReferer,
  identificationHeader,
  type IdentificationMethod,
  type IdentificationHeaderName,
} from './domain/identification.js';
export { NominatimError, isNominatimError } from './domain/error-handler.js';
export type { ErrorCode, ErrorDetails, FailureReason, Transport } from './domain/types.js';
export { logger, type LogLevel } from './domain/logger.js';
export { runWithContext, type RequestContext } from './domain/request-context.js';
export { loadConfig, type ClientConfig } from './config/env.js';
export {
  StatusSchema,
  PlaceSchema,
  AddressSchema,
  ExtraTagsSchema,
  type Status,
  type Place,
  type Address,
  type ExtraTags,
} from './places/schemas.js';

/**
 * Build a client from loaded configuration, applying its log level
 */
export function createClientFromConfig(config: ClientConfig): NominatimClient {
  logger.setLevel(config.logLevel);

  const identification = config.userAgent
    ? fromUserAgent(config.userAgent)
    : fromReferer(config.referer ?? '');

  return new NominatimClient(identification, {
    baseUrl: config.baseUrl,
    timeout: config.timeoutMs,
  });
}

/**
 * Build a client from NOMINATIM_* environment variables
 */
export function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): NominatimClient {
  return createClientFromConfig(loadConfig(env));
}
