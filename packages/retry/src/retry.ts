import {
  NEVER_ABORTED_SIGNAL,
  RequestAbortedError,
  abortReason,
  noopLogger,
  sleep,
} from '@chainrest/core';
import { type RequestLogger, createRequestLogger } from '@chainrest/logging';
import {
  type AttemptOutcome,
  type RetryConfig,
  type RetryConfigInput,
  parseRetryConfig,
} from './config.js';

/**
 * One attempt of the retried operation. It reports failures as outcomes
 * rather than by rejecting.
 */
export type AttemptRunner<R, E extends Error = Error> = (
  attempt: number,
  signal: AbortSignal
) => Promise<AttemptOutcome<R, E>>;

/**
 * Bounded retry loop with a fixed delay between attempts.
 *
 * Runs the operation once, then up to `attempts` more times while
 * `shouldRetry` approves the latest outcome. The decider only ever sees the
 * current attempt; the final outcome is whatever the last attempt produced.
 * The delay is read from `resolveDelay`, when given, as each retry is scheduled.
 *
 * @template R - Successful response type
 * @template E - Error type carried by failed outcomes
 *
 * @example
 * ```typescript
 * const executor = new RetryExecutor<Reply, RestError>({
 *   attempts: 2,
 *   delay: 10,
 *   shouldRetry: (_response, error) => error !== undefined,
 * });
 *
 * const outcome = await executor.execute(async (attempt, signal) => callOnce(signal));
 * ```
 */
export class RetryExecutor<R, E extends Error = Error> {
  private readonly config: RetryConfig<R, E>;
  private readonly logger: RequestLogger;

  /**
   * @throws {RetryConfigurationError} When attempts > 0 and no decider is given
   */
  constructor(config?: RetryConfigInput<R, E>) {
    this.config = parseRetryConfig(config);
    this.logger = createRequestLogger(this.config.logger ?? noopLogger);
  }

  /**
   * Run the operation under the retry policy.
   *
   * An abort of `signal` before or during an attempt, or during a delay, ends
   * the loop with a {@link RequestAbortedError} outcome without consulting the
   * decider. A decider that throws rejects the returned promise.
   */
  async execute(
    run: AttemptRunner<R, E>,
    signal?: AbortSignal
  ): Promise<AttemptOutcome<R, E | RequestAbortedError>> {
    let remaining = this.config.attempts;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return aborted(signal);
      }

      const outcome = await run(attempt, signal ?? NEVER_ABORTED_SIGNAL);

      if (signal?.aborted) {
        return aborted(signal);
      }
      if (remaining <= 0 || ('final' in outcome && outcome.final === true)) {
        return outcome;
      }
      if (!this.shouldRetry(outcome)) {
        this.logger.retryDeclined(attempt, remaining);
        return outcome;
      }

      remaining--;
      const delay = this.currentDelay();
      this.logger.retryScheduled(attempt, remaining, delay);
      this.safeCallOnRetry(attempt, outcome, delay);

      try {
        await sleep(delay, signal);
      } catch (error) {
        this.logger.debug('Retry delay interrupted', {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        return aborted(signal);
      }
    }
  }

  /**
   * Get the configuration.
   */
  getConfig(): Readonly<RetryConfig<R, E>> {
    return this.config;
  }

  private currentDelay(): number {
    const { resolveDelay, delay } = this.config;
    return resolveDelay ? resolveDelay() : delay;
  }

  private shouldRetry(outcome: AttemptOutcome<R, E>): boolean {
    const { shouldRetry } = this.config;
    if (!shouldRetry) {
      return false;
    }
    return shouldRetry(outcome.response, outcome.error);
  }

  /**
   * Call the onRetry hook; a throwing hook is logged and the loop continues.
   */
  private safeCallOnRetry(attempt: number, outcome: AttemptOutcome<R, E>, delay: number): void {
    if (!this.config.onRetry) return;

    try {
      this.config.onRetry(attempt, outcome, delay);
    } catch (callbackError) {
      this.logger.error('onRetry callback threw an error', {
        attempt,
        error: callbackError instanceof Error ? callbackError.message : String(callbackError),
      });
    }
  }
}

function aborted(signal: AbortSignal | undefined): { response: undefined; error: RequestAbortedError } {
  return { response: undefined, error: new RequestAbortedError(abortReason(signal)) };
}
