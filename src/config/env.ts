/**
 * Configuration for the Nominatim client
 * Loads and validates environment variables
 */

import { LOG_LEVELS, type LogLevel } from '../domain/logger.js';

export interface ClientConfig {
  baseUrl: string;
  timeoutMs: number;

  // Exactly one is set; the user agent wins when both are present
  userAgent?: string;
  referer?: string;

  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const baseUrl = env.NOMINATIM_BASE_URL || 'https://nominatim.openstreetmap.org/';
  try {
    new URL(baseUrl);
  } catch {
    throw new Error(`Invalid NOMINATIM_BASE_URL: ${baseUrl}`);
  }

  const rawTimeout = env.NOMINATIM_TIMEOUT_MS || '10000';
  const timeoutMs = parseInt(rawTimeout, 10);
  if (isNaN(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`Invalid NOMINATIM_TIMEOUT_MS: ${rawTimeout}`);
  }

  const userAgent = env.NOMINATIM_USER_AGENT || undefined;
  const referer = userAgent ? undefined : env.NOMINATIM_REFERER || undefined;
  if (!userAgent && !referer) {
    throw new Error(
      'NOMINATIM_USER_AGENT or NOMINATIM_REFERER is required. Set it to your application name or site URL'
    );
  }

  const logLevel = env.NOMINATIM_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid NOMINATIM_LOG_LEVEL: ${logLevel}`);
  }

  return {
    baseUrl,
    timeoutMs,
    userAgent,
    referer,
    logLevel,
  };
}
