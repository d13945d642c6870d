import {
  type MultiValueMap,
  type RestError,
  type RestLogger,
  type TextValue,
  ReadError,
  RequestAssemblyError,
  TransportError,
  UrlParseError,
  durationSchema,
  executeWithTimeout,
  noopLogger,
  now,
  requestOptionsSchema,
  retryPolicySchema,
  toError,
  toText,
} from '@chainrest/core';
import {
  type RequestLogger,
  createRequestLogger,
  withDefaultRedaction,
} from '@chainrest/logging';
import { type OutcomeLabels, type RequestMetrics, noopMetrics } from '@chainrest/metrics';
import { type AttemptOutcome, RetryExecutor, requireRetryPredicate } from '@chainrest/retry';
import {
  type HttpTransport,
  type ReadonlyHeaderMap,
  type TransportRequest,
  decodeBody,
  defaultTransport,
  drainBody,
  normalizeHeaderName,
} from '@chainrest/transport';
import { buildTransportRequest, describeUrl, parseRequestUrl } from './assembly.js';

/**
 * A completed HTTP exchange with its body fully read.
 */
export interface RestResponse {
  /** HTTP status code */
  readonly statusCode: number;
  /** Response headers, lower-cased names */
  readonly headers: ReadonlyHeaderMap;
  /** Body decoded as UTF-8 */
  readonly body: string;
  /** Body bytes as received */
  readonly rawBody: Uint8Array;
}

/**
 * Outcome of {@link RequestBuilder.send}: a response or an error, never both.
 * Any status code counts as a response.
 */
export type SendResult =
  | { response: RestResponse; error: undefined }
  | { response: undefined; error: RestError };

/**
 * Decides after each attempt whether to try again. Sees the builder and the
 * current attempt only.
 */
export type RetryPredicate<TRecords = unknown> = (
  builder: RequestBuilder<TRecords>,
  response: RestResponse | undefined,
  error: RestError | undefined
) => boolean;

/**
 * Retry policy as held by a builder.
 */
export interface RetryPolicy<TRecords = unknown> {
  /** Additional attempts after the first */
  readonly attempts: number;
  /** Fixed delay before each retry in milliseconds */
  readonly delay: number;
  readonly predicate: RetryPredicate<TRecords> | undefined;
}

/**
 * One value or several, rendered as text when stored.
 */
export type ValueInput = TextValue | readonly TextValue[];

/**
 * Map accepted by the replacing setters.
 */
export type ValueMapInput = Readonly<Record<string, ValueInput>>;

/**
 * Options a builder starts from.
 */
export interface RequestOptions<TRecords = unknown> {
  /** Per-attempt timeout in milliseconds, 0 disables it (default: 2000) */
  timeout?: number;
  retry?: {
    attempts?: number;
    delay?: number;
    predicate?: RetryPredicate<TRecords>;
  };
  headers?: ValueMapInput;
  transport?: HttpTransport;
  logger?: RestLogger;
  metrics?: RequestMetrics;
  records?: TRecords;
}

function isValueList(input: ValueInput): input is readonly TextValue[] {
  return Array.isArray(input);
}

function toValues(input: ValueInput): readonly TextValue[] {
  return isValueList(input) ? input : [input];
}

function snapshot(map: ReadonlyMap<string, readonly string[]>): Record<string, string[]> {
  const result: Record<string, string[]> = Object.create(null);
  for (const [key, values] of map) {
    result[key] = [...values];
  }
  return result;
}

function append(map: Map<string, string[]>, name: string, values: readonly TextValue[]): void {
  const rendered = values.map(toText);
  const existing = map.get(name);
  if (existing) {
    existing.push(...rendered);
  } else {
    map.set(name, rendered);
  }
}

function replace(
  map: Map<string, string[]>,
  input: ValueMapInput,
  normalize: (name: string) => string = (name) => name
): void {
  map.clear();
  for (const [name, value] of Object.entries(input)) {
    append(map, normalize(name), toValues(value));
  }
}

/**
 * Chainable description of one HTTP request.
 *
 * Setters mutate the builder and return it. {@link send} performs the
 * request, retrying according to the retry policy, and resolves with either
 * the response or the error; it never rejects for HTTP or transport failures.
 * A builder is not safe for concurrent use.
 *
 * @template TRecords - Type of the caller annotation attached with {@link setRecords}
 *
 * @example
 * ```typescript
 * const { response, error } = await createRequest('GET', 'https://api.example.test/items')
 *   .addQuery('id', 42)
 *   .setTimeout(500)
 *   .setRetry(2, 10, retryOnError)
 *   .send();
 * ```
 */
export class RequestBuilder<TRecords = unknown> {
  private readonly method: string;
  private readonly url: string;
  private timeout: number;
  private retry: RetryPolicy<TRecords> = { attempts: 0, delay: 0, predicate: undefined };
  private readonly params = new Map<string, string>();
  private readonly query = new Map<string, string[]>();
  private readonly headers = new Map<string, string[]>();
  private readonly form = new Map<string, string[]>();
  private body: Uint8Array | undefined;
  private records: TRecords | undefined;
  private transport: HttpTransport;
  private logger: RestLogger;
  private metrics: RequestMetrics;

  /**
   * @throws {ZodError} When the timeout or retry numbers are out of range
   * @throws {RetryConfigurationError} When retry attempts are set without a predicate
   */
  constructor(method: string, url: string, options: RequestOptions<TRecords> = {}) {
    this.method = method;
    this.url = url;
    this.timeout = requestOptionsSchema.parse({ timeout: options.timeout }).timeout;
    this.transport = options.transport ?? defaultTransport;
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics ?? noopMetrics;
    this.records = options.records;

    if (options.retry) {
      this.setRetry(options.retry.attempts ?? 0, options.retry.delay ?? 0, options.retry.predicate);
    }
    if (options.headers) {
      this.setHeader(options.headers);
    }
  }

  /**
   * Replace the per-attempt timeout. 0 disables it.
   *
   * @throws {ZodError} When `ms` is negative or not finite
   */
  setTimeout(ms: number): this {
    this.timeout = durationSchema.parse(ms);
    return this;
  }

  /**
   * Replace the retry policy. `attempts` counts tries after the first.
   *
   * @throws {ZodError} When `attempts` is not a non-negative integer or `delay` is negative
   * @throws {RetryConfigurationError} When `attempts > 0` and no predicate is given
   */
  setRetry(attempts: number, delay: number, predicate?: RetryPredicate<TRecords>): this {
    const parsed = retryPolicySchema.parse({ attempts, delay });
    requireRetryPredicate(parsed.attempts, predicate);
    this.retry = { attempts: parsed.attempts, delay: parsed.delay, predicate };
    return this;
  }

  /**
   * Replace the parameter map. Parameters are never sent; they are caller
   * bookkeeping a retry predicate can read.
   */
  setParam(params: Readonly<Record<string, TextValue>>): this {
    this.params.clear();
    for (const [name, value] of Object.entries(params)) {
      this.params.set(name, toText(value));
    }
    return this;
  }

  /** Set one parameter, replacing any previous value. */
  addParam(name: string, value: TextValue): this {
    this.params.set(name, toText(value));
    return this;
  }

  /** Replace all query parameters. */
  setQuery(query: ValueMapInput): this {
    replace(this.query, query);
    return this;
  }

  /** Append values under a query parameter. */
  addQuery(name: string, ...values: TextValue[]): this {
    append(this.query, name, values);
    return this;
  }

  /** Replace all headers. Names are stored lower-cased. */
  setHeader(headers: ValueMapInput): this {
    replace(this.headers, headers, normalizeHeaderName);
    return this;
  }

  /** Append values under a header name. */
  addHeader(name: string, ...values: TextValue[]): this {
    append(this.headers, normalizeHeaderName(name), values);
    return this;
  }

  /**
   * Replace all form fields. Fields are sent as a url-encoded body when no
   * body is set.
   */
  setForm(form: ValueMapInput): this {
    replace(this.form, form);
    return this;
  }

  /** Append values under a form field. */
  addForm(name: string, ...values: TextValue[]): this {
    append(this.form, name, values);
    return this;
  }

  /** Replace the raw body. Strings are encoded as UTF-8. */
  setBody(body: Uint8Array | string): this {
    this.body = typeof body === 'string' ? new TextEncoder().encode(body) : body.slice();
    return this;
  }

  /** Attach a caller annotation, returned unchanged by {@link getRecords}. */
  setRecords(records: TRecords): this {
    this.records = records;
    return this;
  }

  /** Replace the transport used by {@link send}. */
  setTransport(transport: HttpTransport): this {
    this.transport = transport;
    return this;
  }

  /** Replace the logger. Credentials in headers, query and form are redacted. */
  setLogger(logger: RestLogger): this {
    this.logger = logger;
    return this;
  }

  /** Replace the hooks that record request metrics. */
  setMetrics(metrics: RequestMetrics): this {
    this.metrics = metrics;
    return this;
  }

  getMethod(): string {
    return this.method;
  }

  getUrl(): string {
    return this.url;
  }

  getTimeout(): number {
    return this.timeout;
  }

  getRetry(): RetryPolicy<TRecords> {
    return { ...this.retry };
  }

  getParams(): Record<string, string> {
    return Object.fromEntries(this.params);
  }

  getQuery(): Record<string, string[]> {
    return snapshot(this.query);
  }

  getHeaders(): Record<string, string[]> {
    return snapshot(this.headers);
  }

  getForm(): Record<string, string[]> {
    return snapshot(this.form);
  }

  getBody(): Uint8Array | undefined {
    return this.body?.slice();
  }

  getRecords(): TRecords | undefined {
    return this.records;
  }

  /**
   * Perform the request.
   *
   * The request is assembled from the builder's current state before every
   * attempt, so a retry predicate may change it between tries. URL and method
   * problems end the call without a transport attempt and are never retried.
   * Otherwise at most `attempts + 1` attempts are made.
   * Aborting `signal` cancels the current attempt or delay and yields a
   * {@link RequestAbortedError}.
   *
   * @throws Whatever the retry predicate throws
   */
  async send(signal?: AbortSignal): Promise<SendResult> {
    const { metrics } = this;
    const counter = { attempts: 0 };
    metrics.requestStarted(this.method);

    let result: SendResult | undefined;
    try {
      result = await this.execute(signal, counter);
      return result;
    } finally {
      metrics.requestFinished(
        this.method,
        result ? outcomeLabels(result) : { outcome: 'error', code: 'exception' },
        counter.attempts
      );
    }
  }

  /**
   * Perform the request and return the response, or reject with the final error.
   */
  async sendOrThrow(signal?: AbortSignal): Promise<RestResponse> {
    const result = await this.send(signal);
    if (result.error) {
      throw result.error;
    }
    return result.response;
  }

  private async execute(signal: AbortSignal | undefined, counter: { attempts: number }): Promise<SendResult> {
    const log = this.createLogger();

    let first: TransportRequest;
    try {
      first = this.assemble();
    } catch (caught) {
      return this.assemblyFailed(caught, log);
    }

    log.debug('Sending request', {
      method: first.method,
      url: describeUrl(parseRequestUrl(first.url)),
      query: this.getQuery(),
      headers: first.headers,
      form: this.getForm(),
      timeoutMs: this.timeout,
      retryAttempts: this.retry.attempts,
    });

    const executor = new RetryExecutor<RestResponse, RestError>({
      attempts: this.retry.attempts,
      shouldRetry: (response, error) => {
        const { predicate } = this.retry;
        return predicate ? predicate(this, response, error) : false;
      },
      resolveDelay: () => this.retry.delay,
      onRetry: () => this.metrics.retryScheduled(this.method),
      logger: log,
    });

    const outcome = await executor.execute(async (attempt, attemptSignal) => {
      let request = first;
      if (attempt > 1) {
        try {
          request = this.assemble();
        } catch (caught) {
          return { ...this.assemblyFailed(caught, log), final: true };
        }
      }
      counter.attempts = attempt;
      return this.attempt(request, attempt, attemptSignal, log);
    }, signal);

    if (outcome.error) {
      return { response: undefined, error: outcome.error };
    }
    return outcome;
  }

  /**
   * Assemble the transport request from the builder's current state.
   */
  private assemble(): TransportRequest {
    return buildTransportRequest({
      method: this.method,
      url: this.url,
      query: this.getQuery(),
      headers: this.getHeaders(),
      form: this.getForm(),
      body: this.body,
      timeoutMs: this.timeout,
      defaultHeaders: this.transport.defaultHeaders,
    });
  }

  private assemblyFailed(caught: unknown, log: RequestLogger): { response: undefined; error: RestError } {
    const error = asRestError(caught);
    log.warn('Request could not be assembled', { method: this.method, error: error.message });
    return { response: undefined, error };
  }

  private async attempt(
    request: TransportRequest,
    attempt: number,
    signal: AbortSignal,
    log: RequestLogger
  ): Promise<AttemptOutcome<RestResponse, RestError>> {
    const context = { method: request.method, url: describeUrl(parseRequestUrl(request.url)), attempt };
    const progress: { stage: 'transport' | 'read' } = { stage: 'transport' };
    const started = now();
    log.attemptStarted(context);

    try {
      const response = await executeWithTimeout(
        async (attemptSignal) => {
          const reply = await this.transport.send(request, attemptSignal);
          progress.stage = 'read';
          const rawBody = await drainBody(reply.body);
          return {
            statusCode: reply.status,
            headers: reply.headers,
            body: decodeBody(rawBody),
            rawBody,
          };
        },
        request.timeoutMs,
        signal
      );
      const durationMs = now() - started;
      log.attemptSucceeded(context, response.statusCode, durationMs);
      this.metrics.attemptFinished(
        this.method,
        { outcome: 'response', code: String(response.statusCode) },
        durationMs
      );
      return { response, error: undefined };
    } catch (caught) {
      const cause = toError(caught);
      const error = progress.stage === 'read' ? new ReadError(cause) : new TransportError(cause);
      const durationMs = now() - started;
      log.attemptFailed(context, error, durationMs);
      this.metrics.attemptFinished(this.method, { outcome: 'error', code: error.stage }, durationMs);
      return { response: undefined, error };
    }
  }

  private createLogger(): RequestLogger {
    if (this.logger === noopLogger) {
      return createRequestLogger(noopLogger);
    }
    return createRequestLogger(withDefaultRedaction(this.logger));
  }
}

function outcomeLabels(result: SendResult): OutcomeLabels {
  if (result.error) {
    return { outcome: 'error', code: result.error.stage };
  }
  return { outcome: 'response', code: String(result.response.statusCode) };
}

function asRestError(caught: unknown): RestError {
  if (caught instanceof UrlParseError || caught instanceof RequestAssemblyError) {
    return caught;
  }
  return new RequestAssemblyError(toError(caught));
}

/**
 * Start a request for `method` and `url`.
 *
 * @example
 * ```typescript
 * const response = await createRequest('POST', 'https://api.example.test/login')
 *   .addForm('user', 'alice')
 *   .sendOrThrow();
 * ```
 */
export function createRequest<TRecords = unknown>(
  method: string,
  url: string,
  options?: RequestOptions<TRecords>
): RequestBuilder<TRecords> {
  return new RequestBuilder<TRecords>(method, url, options);
}
