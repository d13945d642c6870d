import { z } from 'zod';
import { readWebStream, emptyBody } from './body.js';
import { fromFetchHeaders, mergeHeaders, toFetchHeaders } from './headers.js';
import {
  type HttpTransport,
  type ReadonlyHeaderMap,
  type TransportRequest,
  type TransportResponse,
} from './types.js';

/**
 * The subset of the fetch API the transport calls.
 */
export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Zod schema for the scalar fetch transport settings.
 */
export const fetchTransportConfigSchema = z.object({
  /** How redirects are handled. @default 'follow' */
  redirect: z.enum(['follow', 'manual', 'error']).default('follow'),
});

/**
 * Fetch transport configuration.
 */
export type FetchTransportConfig = z.input<typeof fetchTransportConfigSchema> & {
  /** Headers sent on every request before the caller's own */
  defaultHeaders?: ReadonlyHeaderMap;
  /** Fetch implementation; the global `fetch` is looked up per call when omitted */
  fetch?: FetchFunction;
};

/**
 * Create a transport backed by the fetch API.
 *
 * Resolves once response headers arrive; the body is exposed as a stream
 * that honours the same abort signal.
 *
 * @example
 * ```typescript
 * const transport = createFetchTransport({
 *   defaultHeaders: { 'user-agent': ['chainrest/0.1'] },
 * });
 * ```
 */
export function createFetchTransport(config: FetchTransportConfig = {}): HttpTransport {
  const { redirect } = fetchTransportConfigSchema.parse({ redirect: config.redirect });
  const doFetch: FetchFunction = config.fetch ?? ((url, init) => fetch(url, init));
  const defaultHeaders = config.defaultHeaders ? mergeHeaders(config.defaultHeaders) : undefined;

  return {
    defaultHeaders,

    async send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
      const init: RequestInit = {
        method: request.method,
        headers: toFetchHeaders(request.headers),
        redirect,
        signal,
      };
      if (request.body && request.body.byteLength > 0) {
        init.body = request.body;
      }

      const response = await doFetch(request.url, init);

      return {
        status: response.status,
        headers: fromFetchHeaders(response.headers),
        body: response.body ? readWebStream(response.body) : emptyBody(),
      };
    },
  };
}

/**
 * Shared fetch transport with no default headers.
 */
export const defaultTransport: HttpTransport = createFetchTransport();
