import { type HeaderMap, type ReadonlyHeaderMap } from './types.js';

/**
 * Header names are case-insensitive; they are stored lower-cased.
 */
export function normalizeHeaderName(name: string): string {
  return name.toLowerCase();
}

/**
 * An empty header map without a prototype, so names like `constructor` are plain keys.
 */
export function createHeaderMap(): HeaderMap {
  const map: HeaderMap = Object.create(null);
  return map;
}

/**
 * Append a value under a header name, keeping any values already present.
 */
export function appendHeader(headers: HeaderMap, name: string, value: string): void {
  const key = normalizeHeaderName(name);
  const existing = Object.hasOwn(headers, key) ? headers[key] : undefined;
  if (existing) {
    existing.push(value);
  } else {
    headers[key] = [value];
  }
}

/**
 * Merge header maps in order into a new map. Later maps append to, never
 * replace, values from earlier ones.
 */
export function mergeHeaders(...maps: (ReadonlyHeaderMap | undefined)[]): HeaderMap {
  const merged = createHeaderMap();
  for (const map of maps) {
    if (!map) continue;
    for (const [name, values] of Object.entries(map)) {
      for (const value of values) {
        appendHeader(merged, name, value);
      }
    }
  }
  return merged;
}

/**
 * True when the map holds at least one value under `name`.
 */
export function hasHeader(headers: ReadonlyHeaderMap, name: string): boolean {
  const key = normalizeHeaderName(name);
  const values = Object.hasOwn(headers, key) ? headers[key] : undefined;
  return values !== undefined && values.length > 0;
}

/**
 * Convert a header map into a fetch Headers object, one append per value.
 */
export function toFetchHeaders(headers: ReadonlyHeaderMap): Headers {
  const result = new Headers();
  for (const [name, values] of Object.entries(headers)) {
    for (const value of values) {
      result.append(name, value);
    }
  }
  return result;
}

/**
 * Convert fetch response headers into a header map.
 * Fetch joins repeated headers with ", "; set-cookie is kept one value per cookie.
 */
export function fromFetchHeaders(headers: Headers): HeaderMap {
  const result = createHeaderMap();
  headers.forEach((value, name) => {
    if (name === 'set-cookie') return;
    appendHeader(result, name, value);
  });
  const cookies = headers.getSetCookie();
  if (cookies.length > 0) {
    result['set-cookie'] = cookies;
  }
  return result;
}
