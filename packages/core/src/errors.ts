/**
 * Pipeline stage an error originated from.
 */
export type ErrorStage =
  | 'url-parse'
  | 'assembly'
  | 'transport'
  | 'read'
  | 'aborted'
  | 'configuration';

/**
 * Interface for errors that can indicate whether they are retryable.
 */
export interface RetryableError {
  retryable: boolean;
}

/**
 * Base error class for all chainrest errors.
 *
 * The message is prefixed with a short static label naming the failing stage,
 * followed by the cause's message when one is given.
 */
export class RestError extends Error implements RetryableError {
  public readonly stage: ErrorStage;
  public readonly retryable: boolean;

  constructor(
    label: string,
    stage: ErrorStage,
    retryable: boolean,
    cause?: Error
  ) {
    super(cause ? `${label}: ${cause.message}` : label, cause ? { cause } : undefined);
    this.name = 'RestError';
    this.stage = stage;
    this.retryable = retryable;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The request URL could not be parsed. Never retried.
 */
export class UrlParseError extends RestError {
  public readonly url: string;

  constructor(url: string, cause?: Error) {
    super('URL parse failed', 'url-parse', false, cause);
    this.name = 'UrlParseError';
    this.url = url;
  }
}

/**
 * A transport request could not be constructed from the builder state
 * (for example an invalid method token). Never retried.
 */
export class RequestAssemblyError extends RestError {
  constructor(cause?: Error) {
    super('request assembly failed', 'assembly', false, cause);
    this.name = 'RequestAssemblyError';
  }
}

/**
 * The transport collaborator failed: connection refused, DNS failure,
 * per-attempt timeout.
 */
export class TransportError extends RestError {
  constructor(cause?: Error) {
    super('transport failed', 'transport', true, cause);
    this.name = 'TransportError';
  }
}

/**
 * A response arrived but its body could not be drained.
 */
export class ReadError extends RestError {
  constructor(cause?: Error) {
    super('body read failed', 'read', true, cause);
    this.name = 'ReadError';
  }
}

/**
 * The caller's AbortSignal fired during an attempt or a retry delay.
 */
export class RequestAbortedError extends RestError {
  constructor(cause?: Error) {
    super('request aborted', 'aborted', false, cause);
    this.name = 'RequestAbortedError';
  }
}

/**
 * The caller broke the retry contract, e.g. retries without a predicate.
 * Thrown at configuration time, never returned as an outcome.
 */
export class RetryConfigurationError extends RestError {
  constructor(message: string) {
    super(message, 'configuration', false);
    this.name = 'RetryConfigurationError';
  }
}

/**
 * Error raised when an attempt exceeds its timeout.
 * Surfaces to callers as the cause of a {@link TransportError} or {@link ReadError}.
 */
export class TimeoutError extends Error implements RetryableError {
  public readonly timeoutMs: number;
  public readonly retryable = true;

  constructor(message = 'Request timed out', timeoutMs = 0) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Type guard to check if an error implements RetryableError interface.
 */
export function isRetryableError(error: unknown): error is Error & RetryableError {
  return (
    error instanceof Error &&
    'retryable' in error &&
    typeof error.retryable === 'boolean'
  );
}

/**
 * Check if an error is retryable.
 * Returns undefined if the error doesn't implement RetryableError (let caller decide).
 */
export function isRetryable(error: unknown): boolean | undefined {
  if (isRetryableError(error)) {
    return error.retryable;
  }
  return undefined;
}

/**
 * Normalise anything thrown into an Error instance.
 */
export function toError(reason: unknown): Error {
  if (reason instanceof Error) {
    return reason;
  }
  if (typeof reason === 'string') {
    return new Error(reason);
  }
  if (reason !== undefined && reason !== null) {
    try {
      return new Error(JSON.stringify(reason));
    } catch {
      return new Error('Unknown error');
    }
  }
  return new Error('Unknown error');
}
