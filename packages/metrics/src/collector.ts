import {
  type Registry,
  type Counter,
  type CounterConfiguration,
  type Gauge,
  type GaugeConfiguration,
  type Histogram,
  type HistogramConfiguration,
  type Labels,
  REQUEST_LABELS,
} from './types.js';

/**
 * Prometheus metrics describing outbound requests.
 */
export interface MetricsCollector {
  /** Completed sends by method, outcome and code */
  requests: Counter;
  /** Sends currently in progress */
  requestsInFlight: Gauge;
  /** Attempts made per send */
  attemptsPerRequest: Histogram;
  /** Individual attempts by method, outcome and code */
  attempts: Counter;
  /** Attempt duration in seconds, body read included */
  attemptDuration: Histogram;
  /** Retries scheduled */
  retries: Counter;
}

/**
 * Configuration for creating a metrics collector.
 */
export interface MetricsCollectorConfig {
  /** Prometheus registry (uses default if not provided) */
  registry?: Registry;
  /** Metric name prefix (default: 'chainrest_') */
  prefix?: string;
}

/**
 * Prometheus metric factory functions.
 */
export interface PromClientFactories {
  Counter: new (config: CounterConfiguration) => Counter;
  Gauge: new (config: GaugeConfiguration) => Gauge;
  Histogram: new (config: HistogramConfiguration) => Histogram;
}

/**
 * Default histogram buckets for duration metrics (in seconds).
 */
export const DEFAULT_DURATION_BUCKETS = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

/**
 * Default histogram buckets for attempts per send.
 */
export const DEFAULT_ATTEMPT_BUCKETS = [1, 2, 3, 4, 5, 10];

/**
 * Create a metrics collector using prom-client.
 *
 * @param promClient - prom-client module
 * @param config - Collector configuration
 *
 * @example
 * ```typescript
 * import * as promClient from 'prom-client';
 * import { createMetricsCollector, createRequestMetrics } from '@chainrest/metrics';
 *
 * const metrics = createRequestMetrics(createMetricsCollector(promClient, { prefix: 'billing_' }));
 * const client = new RestClient({ metrics });
 * ```
 */
export function createMetricsCollector(
  promClient: PromClientFactories & { register?: Registry },
  config: MetricsCollectorConfig = {}
): MetricsCollector {
  const prefix = config.prefix ?? 'chainrest_';
  const registersConfig = config.registry ? { registers: [config.registry] } : {};

  const { Counter, Gauge, Histogram } = promClient;
  const { METHOD, OUTCOME, CODE } = REQUEST_LABELS;

  return {
    requests: new Counter({
      name: `${prefix}requests_total`,
      help: 'Total number of completed sends',
      labelNames: [METHOD, OUTCOME, CODE],
      ...registersConfig,
    }),

    requestsInFlight: new Gauge({
      name: `${prefix}requests_in_flight`,
      help: 'Number of sends in progress',
      labelNames: [METHOD],
      ...registersConfig,
    }),

    attemptsPerRequest: new Histogram({
      name: `${prefix}attempts_per_request`,
      help: 'Distribution of attempts made per send',
      labelNames: [METHOD, OUTCOME],
      buckets: DEFAULT_ATTEMPT_BUCKETS,
      ...registersConfig,
    }),

    attempts: new Counter({
      name: `${prefix}attempts_total`,
      help: 'Total number of transport attempts',
      labelNames: [METHOD, OUTCOME, CODE],
      ...registersConfig,
    }),

    attemptDuration: new Histogram({
      name: `${prefix}attempt_duration_seconds`,
      help: 'Duration of transport attempts including the body read',
      labelNames: [METHOD, OUTCOME],
      buckets: DEFAULT_DURATION_BUCKETS,
      ...registersConfig,
    }),

    retries: new Counter({
      name: `${prefix}retries_total`,
      help: 'Total number of scheduled retries',
      labelNames: [METHOD],
      ...registersConfig,
    }),
  };
}

/**
 * How an attempt or a send ended, as metric labels see it.
 */
export interface OutcomeLabels {
  outcome: 'response' | 'error';
  /** Status code for responses, error stage for errors */
  code: string;
}

/**
 * Hooks a request calls as it progresses.
 */
export interface RequestMetrics {
  requestStarted(method: string): void;
  attemptFinished(method: string, result: OutcomeLabels, durationMs: number): void;
  retryScheduled(method: string): void;
  requestFinished(method: string, result: OutcomeLabels, attempts: number): void;
}

/**
 * Metrics hooks that record nothing.
 */
export const noopMetrics: RequestMetrics = {
  requestStarted: () => undefined,
  attemptFinished: () => undefined,
  retryScheduled: () => undefined,
  requestFinished: () => undefined,
};

/**
 * Record request progress into a collector.
 */
export function createRequestMetrics(collector: MetricsCollector): RequestMetrics {
  return {
    requestStarted(method: string): void {
      collector.requestsInFlight.inc({ method });
    },

    attemptFinished(method: string, result: OutcomeLabels, durationMs: number): void {
      const labels: Labels = { method, outcome: result.outcome, code: result.code };
      collector.attempts.inc(labels);
      collector.attemptDuration.observe({ method, outcome: result.outcome }, durationMs / 1000);
    },

    retryScheduled(method: string): void {
      collector.retries.inc({ method });
    },

    requestFinished(method: string, result: OutcomeLabels, attempts: number): void {
      collector.requestsInFlight.dec({ method });
      collector.requests.inc({ method, outcome: result.outcome, code: result.code });
      collector.attemptsPerRequest.observe({ method, outcome: result.outcome }, attempts);
    },
  };
}
