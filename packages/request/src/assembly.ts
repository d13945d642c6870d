import { type MultiValueMap, RequestAssemblyError, UrlParseError, toError } from '@chainrest/core';
import {
  type ReadonlyHeaderMap,
  type TransportRequest,
  appendHeader,
  hasHeader,
  mergeHeaders,
} from '@chainrest/transport';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;

/** RFC 9110 token characters */
const METHOD_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/** Methods fetch refuses to send with a payload */
const BODYLESS_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);

const encoder = new TextEncoder();

/**
 * True when `value` holds an ASCII control character.
 */
export function hasControlCharacter(value: string): boolean {
  return CONTROL_CHARACTER.test(value);
}

/**
 * Parse an absolute request URL.
 *
 * @throws {UrlParseError} When the URL holds a control character or is not absolute
 */
export function parseRequestUrl(raw: string): URL {
  if (hasControlCharacter(raw)) {
    throw new UrlParseError(raw, new Error('invalid control character in URL'));
  }
  try {
    return new URL(raw);
  } catch (error) {
    throw new UrlParseError(raw, toError(error));
  }
}

/**
 * Check a method is a valid HTTP token. An empty method means GET.
 *
 * @throws {RequestAssemblyError} When the method is not a token
 */
export function validateMethod(method: string): string {
  if (method === '') {
    return 'GET';
  }
  if (!METHOD_TOKEN.test(method)) {
    throw new RequestAssemblyError(new Error(`invalid method ${JSON.stringify(method)}`));
  }
  return method;
}

/**
 * Escape one query or form component: unreserved characters
 * (`A-Z a-z 0-9 - _ . ~`) stay, space becomes `+`, everything else is
 * percent-encoded as UTF-8.
 *
 * @throws {URIError} On a lone surrogate
 */
export function escapeQueryComponent(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Order strings by code point, which is the order of their UTF-8 bytes.
 * Plain `sort()` compares UTF-16 units and puts astral characters before
 * U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let index = 0;
  while (index < a.length && index < b.length) {
    const left = a.codePointAt(index) ?? 0;
    const right = b.codePointAt(index) ?? 0;
    if (left !== right) {
      return left - right;
    }
    index += left > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
}

/**
 * Encode a multi-valued map as `application/x-www-form-urlencoded`.
 * Keys are sorted by UTF-8 bytes; values under a key keep their insertion order.
 */
export function encodeQuery(values: MultiValueMap): string {
  const pairs: string[] = [];
  for (const key of Object.keys(values).sort(compareCodePoints)) {
    const escapedKey = escapeQueryComponent(key);
    for (const value of values[key] ?? []) {
      pairs.push(`${escapedKey}=${escapeQueryComponent(value)}`);
    }
  }
  return pairs.join('&');
}

/**
 * URL without its query, fragment or credentials, for logging.
 */
export function describeUrl(url: URL): string {
  return `${url.origin}${url.pathname}`;
}

/**
 * Builder state needed to assemble a transport request.
 */
export interface AssemblyInput {
  method: string;
  url: string;
  query: MultiValueMap;
  headers: MultiValueMap;
  form: MultiValueMap;
  body: Uint8Array | undefined;
  timeoutMs: number;
  defaultHeaders: ReadonlyHeaderMap | undefined;
}

/**
 * Turn builder state into the descriptor a transport sends.
 *
 * The encoded query replaces any query already in the URL. Headers are
 * appended after the transport defaults. When no body is set, a non-empty
 * form is encoded into the body with a form content type unless one was given.
 * A GET or HEAD request with a non-empty body or form is refused.
 *
 * @throws {UrlParseError} When the URL cannot be parsed
 * @throws {RequestAssemblyError} When the method, a value or the payload cannot be sent
 */
export function buildTransportRequest(input: AssemblyInput): TransportRequest {
  const url = parseRequestUrl(input.url);
  const method = validateMethod(input.method);

  try {
    const query = encodeQuery(input.query);
    url.search = query === '' ? '' : `?${query}`;

    const headers = mergeHeaders(input.defaultHeaders, input.headers);

    let body = input.body;
    if (body === undefined && Object.keys(input.form).length > 0) {
      body = encoder.encode(encodeQuery(input.form));
      if (!hasHeader(headers, 'content-type')) {
        appendHeader(headers, 'content-type', FORM_CONTENT_TYPE);
      }
    }
    if (body !== undefined && body.length > 0 && BODYLESS_METHODS.has(method.toUpperCase())) {
      throw new Error(`${method} request cannot carry a body`);
    }

    return { method, url: url.href, headers, body, timeoutMs: input.timeoutMs };
  } catch (error) {
    throw new RequestAssemblyError(toError(error));
  }
}
