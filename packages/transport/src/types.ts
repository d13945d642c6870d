/**
 * Header map as it travels across the transport boundary:
 * lower-cased names, every value in the order it was added.
 */
export type HeaderMap = Record<string, string[]>;

/**
 * Read-only view of a {@link HeaderMap}.
 */
export type ReadonlyHeaderMap = Readonly<Record<string, readonly string[]>>;

/**
 * Request descriptor handed to a transport for one attempt.
 */
export interface TransportRequest {
  /** HTTP method, passed through as given */
  readonly method: string;
  /** Absolute URL including the encoded query string */
  readonly url: string;
  /** Headers to send, transport defaults first */
  readonly headers: ReadonlyHeaderMap;
  /** Raw payload, if any */
  readonly body: Uint8Array | undefined;
  /** Per-attempt timeout in milliseconds (0 = none); also enforced by the caller via the signal */
  readonly timeoutMs: number;
}

/**
 * What a transport resolves with once response headers have arrived.
 * The caller drains `body` exactly once.
 */
export interface TransportResponse {
  readonly status: number;
  readonly headers: ReadonlyHeaderMap;
  readonly body: AsyncIterable<Uint8Array>;
}

/**
 * The external HTTP engine a request delegates to.
 *
 * Implementations reject on connection-level failures and must honour the
 * abort signal for both the round trip and the body stream.
 */
export interface HttpTransport {
  /** Headers placed on every request before the caller's own */
  readonly defaultHeaders?: ReadonlyHeaderMap;

  send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse>;
}
