import { z } from 'zod';
import {
  type RestLogger,
  RetryConfigurationError,
  retryPolicySchema,
} from '@chainrest/core';

/**
 * Result of one attempt: a response or an error, never both.
 * An error marked `final` ends the loop without consulting the decider.
 */
export type AttemptOutcome<R, E extends Error = Error> =
  | { response: R; error: undefined }
  | { response: undefined; error: E; final?: boolean };

/**
 * Supplies the delay before the next retry, read each time one is scheduled.
 */
export type DelayResolver = () => number;

/**
 * Decides from the current attempt alone whether to try again.
 */
export type OutcomeDecider<R, E extends Error = Error> = (
  response: R | undefined,
  error: E | undefined
) => boolean;

/**
 * Called before each retry delay with the attempt that just finished.
 */
export type RetryHook<R, E extends Error = Error> = (
  attempt: number,
  outcome: AttemptOutcome<R, E>,
  delayMs: number
) => void;

/**
 * Zod schema for retry executor configuration.
 * The numeric policy comes from core; callbacks are checked for shape only.
 */
export const retryConfigSchema = retryPolicySchema.extend({
  /** Decides whether another attempt is made; required when attempts > 0 */
  shouldRetry: z.custom<OutcomeDecider<unknown, Error>>((value) => typeof value === 'function').optional(),
  /** Invoked before each retry delay */
  onRetry: z.custom<RetryHook<unknown, Error>>((value) => typeof value === 'function').optional(),
  /** Overrides `delay` when given */
  resolveDelay: z.custom<DelayResolver>((value) => typeof value === 'function').optional(),
});

/**
 * Full configuration type including callbacks and logger.
 */
export interface RetryConfig<R, E extends Error = Error> {
  /** Additional attempts after the first */
  attempts: number;
  /** Fixed delay before each retry in milliseconds */
  delay: number;
  shouldRetry: OutcomeDecider<R, E> | undefined;
  onRetry: RetryHook<R, E> | undefined;
  resolveDelay: DelayResolver | undefined;
  logger: RestLogger | undefined;
}

/**
 * Input config type for constructor.
 */
export interface RetryConfigInput<R, E extends Error = Error> {
  attempts?: number;
  delay?: number;
  shouldRetry?: OutcomeDecider<R, E>;
  onRetry?: RetryHook<R, E>;
  resolveDelay?: DelayResolver;
  logger?: RestLogger;
}

/**
 * Parse and validate retry configuration.
 *
 * @throws {ZodError} When attempts or delay are out of range
 * @throws {RetryConfigurationError} When attempts > 0 and no `shouldRetry` is given
 */
export function parseRetryConfig<R, E extends Error = Error>(
  config: RetryConfigInput<R, E> = {}
): RetryConfig<R, E> {
  const parsed = retryConfigSchema.parse({
    attempts: config.attempts,
    delay: config.delay,
    shouldRetry: config.shouldRetry,
    onRetry: config.onRetry,
    resolveDelay: config.resolveDelay,
  });

  requireRetryPredicate(parsed.attempts, config.shouldRetry);

  return {
    attempts: parsed.attempts,
    delay: parsed.delay,
    shouldRetry: config.shouldRetry,
    onRetry: config.onRetry,
    resolveDelay: config.resolveDelay,
    logger: config.logger,
  };
}

/**
 * Enforce that retries come with a predicate deciding them.
 *
 * @throws {RetryConfigurationError} When `attempts > 0` and `predicate` is undefined
 */
export function requireRetryPredicate(attempts: number, predicate: unknown): void {
  if (attempts > 0 && predicate === undefined) {
    throw new RetryConfigurationError(
      `retry predicate is required when attempts is ${String(attempts)}`
    );
  }
}
