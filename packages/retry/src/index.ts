export { RetryExecutor, type AttemptRunner } from './retry.js';
export {
  retryConfigSchema,
  parseRetryConfig,
  requireRetryPredicate,
  type AttemptOutcome,
  type OutcomeDecider,
  type RetryHook,
  type DelayResolver,
  type RetryConfig,
  type RetryConfigInput,
} from './config.js';
export {
  type StatusCarrier,
  type OutcomePredicate,
  RETRYABLE_STATUS_CODES,
  retryOnError,
  retryOnStatus,
  retryOnServerError,
  retryWhenRetryable,
  anyOf,
} from './predicates.js';
