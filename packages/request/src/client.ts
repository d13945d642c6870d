import { z } from 'zod';
import {
  type RestLogger,
  DEFAULT_TIMEOUT_MS,
  durationSchema,
  noopLogger,
  retryPolicySchema,
} from '@chainrest/core';
import { type RequestMetrics, noopMetrics } from '@chainrest/metrics';
import { requireRetryPredicate } from '@chainrest/retry';
import { type HttpTransport, defaultTransport } from '@chainrest/transport';
import {
  type RequestBuilder,
  type RetryPredicate,
  type ValueMapInput,
  createRequest,
} from './builder.js';
import { hasControlCharacter } from './assembly.js';

/**
 * Zod schema for the scalar client defaults.
 */
export const restClientConfigSchema = z.object({
  /** Base URL that relative request URLs are resolved against */
  baseUrl: z.url().optional(),
  /** Per-attempt timeout in milliseconds, 0 disables it (default: 2000) */
  timeout: durationSchema.default(DEFAULT_TIMEOUT_MS),
  /** Additional attempts after the first (default: 0) */
  retryAttempts: retryPolicySchema.shape.attempts,
  /** Fixed delay before each retry in milliseconds (default: 0) */
  retryDelay: retryPolicySchema.shape.delay,
});

export type RestClientConfigInput = z.input<typeof restClientConfigSchema>;

/**
 * Full client configuration including defaults that are not plain values.
 */
export interface RestClientConfig extends RestClientConfigInput {
  retryPredicate?: RetryPredicate;
  /** Headers added to every request before its own */
  headers?: ValueMapInput;
  transport?: HttpTransport;
  logger?: RestLogger;
  metrics?: RequestMetrics;
}

/**
 * Source of pre-configured request builders sharing timeout, retry,
 * header, transport, logger and metrics defaults.
 *
 * @example
 * ```typescript
 * const client = new RestClient({
 *   baseUrl: 'https://api.example.test/v1/',
 *   timeout: 1000,
 *   retryAttempts: 2,
 *   retryDelay: 50,
 *   retryPredicate: retryWhenRetryable,
 *   headers: { accept: 'application/json' },
 * });
 *
 * const { response, error } = await client.get('items').addQuery('id', 42).send();
 * ```
 */
export class RestClient {
  private readonly config: z.output<typeof restClientConfigSchema>;
  private readonly retryPredicate: RetryPredicate | undefined;
  private readonly headers: ValueMapInput;
  private readonly transport: HttpTransport;
  private readonly logger: RestLogger;
  private readonly metrics: RequestMetrics;

  /**
   * @throws {ZodError} When a default is out of range
   * @throws {RetryConfigurationError} When retries are configured without a predicate
   */
  constructor(config: RestClientConfig = {}) {
    this.config = restClientConfigSchema.parse({
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      retryAttempts: config.retryAttempts,
      retryDelay: config.retryDelay,
    });
    requireRetryPredicate(this.config.retryAttempts, config.retryPredicate);
    this.retryPredicate = config.retryPredicate;
    this.headers = config.headers ?? {};
    this.transport = config.transport ?? defaultTransport;
    this.logger = config.logger ?? noopLogger;
    this.metrics = config.metrics ?? noopMetrics;
  }

  /**
   * Start a request with the client defaults applied.
   */
  request<TRecords = unknown>(method: string, url: string): RequestBuilder<TRecords> {
    return createRequest<TRecords>(method, this.resolve(url), {
      timeout: this.config.timeout,
      retry: {
        attempts: this.config.retryAttempts,
        delay: this.config.retryDelay,
        predicate: this.retryPredicate,
      },
      headers: this.headers,
      transport: this.transport,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  get<TRecords = unknown>(url: string): RequestBuilder<TRecords> {
    return this.request<TRecords>('GET', url);
  }

  head<TRecords = unknown>(url: string): RequestBuilder<TRecords> {
    return this.request<TRecords>('HEAD', url);
  }

  post<TRecords = unknown>(url: string): RequestBuilder<TRecords> {
    return this.request<TRecords>('POST', url);
  }

  put<TRecords = unknown>(url: string): RequestBuilder<TRecords> {
    return this.request<TRecords>('PUT', url);
  }

  patch<TRecords = unknown>(url: string): RequestBuilder<TRecords> {
    return this.request<TRecords>('PATCH', url);
  }

  delete<TRecords = unknown>(url: string): RequestBuilder<TRecords> {
    return this.request<TRecords>('DELETE', url);
  }

  /**
   * Get the parsed configuration.
   */
  getConfig(): Readonly<z.output<typeof restClientConfigSchema>> {
    return this.config;
  }

  /**
   * Resolve `url` against the base URL. URLs that do not resolve are passed
   * through so the request reports them when sent.
   */
  private resolve(url: string): string {
    const { baseUrl } = this.config;
    if (baseUrl === undefined || hasControlCharacter(url) || URL.canParse(url)) {
      return url;
    }
    return URL.canParse(url, baseUrl) ? new URL(url, baseUrl).href : url;
  }
}
