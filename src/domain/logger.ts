/**
 * Structured JSON logger for the Nominatim client
 *
 * Entries go to stderr so that stdout stays free for the host program
 */

import type { Endpoint } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

class Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log a request about to be sent to the Nominatim server
   */
  logRequestStart(endpoint: Endpoint, url: string, requestId: string): void {
    this.debug('Nominatim request starting', { requestId, endpoint, url });
  }

  /**
   * Log a completed round trip, whatever its status
   */
  logRequestEnd(
    endpoint: Endpoint,
    url: string,
    status: number,
    latencyMs: number,
    requestId: string
  ): void {
    this.debug('Nominatim request completed', {
      requestId,
      endpoint,
      url,
      status,
      latencyMs,
    });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(JSON.stringify(entry));
  }
}

// Shared by every client in the process
const logger = new Logger();

export { logger };
