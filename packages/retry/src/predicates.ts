import { isRetryable } from '@chainrest/core';

/**
 * Anything exposing an HTTP status code.
 */
export interface StatusCarrier {
  readonly statusCode: number;
}

/**
 * A retry predicate that ignores its subject, so it fits any
 * `(subject, response, error) => boolean` signature.
 */
export type OutcomePredicate = (
  subject: unknown,
  response: StatusCarrier | undefined,
  error: Error | undefined
) => boolean;

/** Status codes worth another try once the server asks for it or is briefly unavailable */
export const RETRYABLE_STATUS_CODES: readonly number[] = [429, 502, 503, 504];

/**
 * Retry whenever the attempt failed without a response.
 */
export const retryOnError: OutcomePredicate = (_subject, _response, error) => error !== undefined;

/**
 * Retry when the response carries one of the given status codes.
 * Errors are not retried.
 */
export function retryOnStatus(...codes: number[]): OutcomePredicate {
  const wanted = new Set(codes);
  return (_subject, response) => response !== undefined && wanted.has(response.statusCode);
}

/**
 * Retry on any error or a 5xx response.
 */
export const retryOnServerError: OutcomePredicate = (_subject, response, error) =>
  error !== undefined || (response !== undefined && response.statusCode >= 500);

/**
 * Retry errors flagged retryable, and responses with a status in
 * {@link RETRYABLE_STATUS_CODES}.
 */
export const retryWhenRetryable: OutcomePredicate = (_subject, response, error) => {
  if (error !== undefined) {
    return isRetryable(error) === true;
  }
  return response !== undefined && RETRYABLE_STATUS_CODES.includes(response.statusCode);
};

/**
 * Combine predicates; retry when any of them approves.
 */
export function anyOf(...predicates: OutcomePredicate[]): OutcomePredicate {
  return (subject, response, error) =>
    predicates.some((predicate) => predicate(subject, response, error));
}
