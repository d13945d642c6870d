import { type RestLogger } from '@chainrest/core';

/**
 * Log level enumeration.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Context data to include in log messages.
 */
export type LogContext = Record<string, unknown>;

export type { RestLogger } from '@chainrest/core';

/**
 * Logger with child logger support.
 *
 * Compatible with pino, winston, and other logging libraries
 * that support child loggers.
 */
export interface ScopedLogger extends RestLogger {
  /**
   * Create a child logger with additional context.
   *
   * @param bindings - Context to bind to all log messages
   */
  child(bindings: LogContext): ScopedLogger;
}

/**
 * Fields describing one attempt of a request.
 */
export interface AttemptContext {
  method: string;
  url: string;
  attempt: number;
}

/**
 * Logger with request-lifecycle events layered on a base logger.
 */
export interface RequestLogger extends RestLogger {
  attemptStarted(attempt: AttemptContext, context?: LogContext): void;
  attemptSucceeded(attempt: AttemptContext, statusCode: number, durationMs: number): void;
  attemptFailed(attempt: AttemptContext, error: Error, durationMs: number): void;
  retryScheduled(attempt: number, remaining: number, delayMs: number): void;
  retryDeclined(attempt: number, remaining: number): void;
}

/**
 * Create a request-aware logger from a base logger.
 *
 * @param logger - Base logger
 * @returns Request logger with lifecycle methods
 */
export function createRequestLogger(logger: RestLogger): RequestLogger {
  return {
    debug: (msg, context) => logger.debug(msg, context),
    info: (msg, context) => logger.info(msg, context),
    warn: (msg, context) => logger.warn(msg, context),
    error: (msg, context) => logger.error(msg, context),

    attemptStarted(attempt: AttemptContext, context?: LogContext): void {
      logger.debug(`${attempt.method} ${attempt.url} attempt ${String(attempt.attempt)}`, {
        ...context,
        ...attempt,
      });
    },

    attemptSucceeded(attempt: AttemptContext, statusCode: number, durationMs: number): void {
      logger.debug(`${attempt.method} ${attempt.url} -> ${String(statusCode)}`, {
        ...attempt,
        statusCode,
        durationMs,
      });
    },

    attemptFailed(attempt: AttemptContext, error: Error, durationMs: number): void {
      logger.warn(`${attempt.method} ${attempt.url} failed`, {
        ...attempt,
        error: error.message,
        errorName: error.name,
        durationMs,
      });
    },

    retryScheduled(attempt: number, remaining: number, delayMs: number): void {
      logger.info('Retrying after delay', {
        attempt,
        nextAttempt: attempt + 1,
        remaining,
        delayMs,
      });
    },

    retryDeclined(attempt: number, remaining: number): void {
      logger.debug('Retry predicate declined, returning current outcome', {
        attempt,
        remaining,
      });
    },
  };
}
