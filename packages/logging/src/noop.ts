import { type ScopedLogger, type LogContext } from './logger.js';

/**
 * No-operation logger that discards all log messages.
 *
 * This is what a request logs through when no logger is configured.
 */
export const noopLogger: ScopedLogger = {
  debug(): void {
    // No-op
  },

  info(): void {
    // No-op
  },

  warn(): void {
    // No-op
  },

  error(): void {
    // No-op
  },

  child(_bindings: LogContext): ScopedLogger {
    return noopLogger;
  },
};

/**
 * Returns the singleton noop logger instance.
 */
export function createNoopLogger(): ScopedLogger {
  return noopLogger;
}
