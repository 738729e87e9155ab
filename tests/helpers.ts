/**
 * Shared helpers for unit tests
 */

import { readFileSync } from 'node:fs';

/**
 * Read a JSON fixture from tests/fixtures
 */
export function loadFixture(name: string): unknown {
  const text = readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
  const data: unknown = JSON.parse(text);
  return data;
}

/**
 * Build a JSON response the way a Nominatim server sends one
 */
export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    ...init,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Run a function that is expected to throw and return what it threw
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
