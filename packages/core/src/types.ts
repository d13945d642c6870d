/**
 * Logger interface for structured logging across all packages.
 * Compatible with pino, winston, console, and custom implementations.
 */
export interface RestLogger {
  debug(msg: string, context?: Record<string, unknown>): void;
  info(msg: string, context?: Record<string, unknown>): void;
  warn(msg: string, context?: Record<string, unknown>): void;
  error(msg: string, context?: Record<string, unknown>): void;
}

/**
 * No-operation logger that discards all log messages.
 */
export const noopLogger: RestLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Values accepted wherever the builder renders a value as text
 * (query, header, form and param values).
 */
export type TextValue = string | number | boolean | bigint | Date;

/**
 * Multi-valued string mapping used for query, header and form state.
 */
export type MultiValueMap = Record<string, readonly string[]>;
