/**
 * Query string construction for Nominatim requests
 */

export type QueryParams = Record<string, string | number | undefined>;

/**
 * Encode a single query value. Spaces become '+' and commas stay literal,
 * which is how Nominatim documents its list parameters.
 */
export function encodeQueryValue(value: string): string {
  return encodeURIComponent(value).replace(/%20/g, '+').replace(/%2C/gi, ',');
}

/**
 * Build an ordered query string, skipping undefined values
 *
 * @example
 * buildQueryString({ lat: '1.5', lon: '2', zoom: undefined })
 * // => 'lat=1.5&lon=2'
 */
export function buildQueryString(params: QueryParams): string {
  return Object.entries(params)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${encodeQueryValue(String(value))}`)
    .join('&');
}
