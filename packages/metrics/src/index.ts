export {
  type Registry,
  type Metric,
  type Counter,
  type Gauge,
  type Histogram,
  type Labels,
  REQUEST_LABELS,
} from './types.js';

export {
  type MetricsCollector,
  type MetricsCollectorConfig,
  type PromClientFactories,
  type OutcomeLabels,
  type RequestMetrics,
  DEFAULT_DURATION_BUCKETS,
  DEFAULT_ATTEMPT_BUCKETS,
  createMetricsCollector,
  createRequestMetrics,
  noopMetrics,
} from './collector.js';
