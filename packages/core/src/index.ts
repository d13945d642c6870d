// Errors
export {
  RestError,
  UrlParseError,
  RequestAssemblyError,
  TransportError,
  ReadError,
  RequestAbortedError,
  RetryConfigurationError,
  TimeoutError,
  isRetryable,
  isRetryableError,
  toError,
  type ErrorStage,
  type RetryableError,
} from './errors.js';

// Types
export {
  type RestLogger,
  type TextValue,
  type MultiValueMap,
  noopLogger,
} from './types.js';

// Utilities
export {
  NEVER_ABORTED_SIGNAL,
  sleep,
  abortReason,
  executeWithTimeout,
  scheduleTimer,
  MAX_TIMER_DELAY_MS,
  combineSignals,
  toText,
  now,
} from './utils.js';

// Schemas
export {
  DEFAULT_TIMEOUT_MS,
  durationSchema,
  requestOptionsSchema,
  retryPolicySchema,
  type RequestOptionsInput,
  type RequestOptionsParsed,
  type RetryPolicyInput,
  type RetryPolicyParsed,
} from './schemas.js';
