import { z } from 'zod';
import { type LogContext, type RestLogger, type ScopedLogger } from './logger.js';

/**
 * Zod schema for redaction configuration.
 */
export const redactionConfigSchema = z.object({
  /** Keys to redact, matched case-insensitively. */
  keys: z.array(z.string()).readonly(),

  /** Patterns tested against each key. */
  patterns: z.array(z.instanceof(RegExp)).readonly().default([]),

  /** Replacement value for redacted fields. @default '[REDACTED]' */
  replacement: z.string().default('[REDACTED]'),

  /** Whether to descend into nested objects and arrays. @default true */
  deep: z.boolean().default(true),

  /** Maximum depth for nested object redaction. @default 10 */
  maxDepth: z.number().int().positive().max(20).default(10),

  /** Marker for circular references. @default '[Circular]' */
  circularMarker: z.string().default('[Circular]'),

  /** Marker for max depth exceeded. @default '[Max Depth Exceeded]' */
  maxDepthMarker: z.string().default('[Max Depth Exceeded]'),
});

/**
 * Configuration for log redaction.
 */
export type RedactionConfig = z.input<typeof redactionConfigSchema>;

/**
 * Parsed configuration with all defaults applied.
 */
export type ParsedRedactionConfig = z.output<typeof redactionConfigSchema>;

/**
 * Header, query and form keys that carry credentials on HTTP requests.
 */
export const DEFAULT_SENSITIVE_KEYS: readonly string[] = [
  // Headers
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'x-csrf-token',
  'x-xsrf-token',
  'x-amz-security-token',
  // Query and form fields
  'api_key',
  'apikey',
  'access_token',
  'refresh_token',
  'id_token',
  'client_secret',
  'code_verifier',
  'password',
  'passwd',
  'secret',
  'token',
  'signature',
  'session_id',
  'sessionid',
];

/**
 * Default patterns for matching sensitive keys.
 */
export const DEFAULT_SENSITIVE_PATTERNS: readonly RegExp[] = [
  /password(?![a-z])/i,
  /secret(?![a-z])/,
  /token(?![a-z])/i,
  /api[_-]?key/i,
  /authorization/i,
  /credential/i,
  /session[_-]?id/i,
  /^x-api-/i,
  /^x-auth-/i,
];

/**
 * Keys that should never be used as object keys (prototype pollution protection).
 */
const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Type guard to check if a value is a plain object (not an array, null, Date, etc.)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Redact sensitive values from a log context object.
 *
 * A matching key has its whole value replaced, so a header carrying several
 * values (`{ authorization: ['Bearer a', 'Bearer b'] }`) becomes a single
 * replacement string.
 *
 * @param context - The log context to redact
 * @param config - Redaction configuration
 * @returns New object with sensitive values redacted
 */
export function redactContext(context: LogContext, config: RedactionConfig): LogContext {
  return redactWith(context, redactionConfigSchema.parse(config));
}

function redactWith(context: LogContext, config: ParsedRedactionConfig): LogContext {
  const keySet = new Set(config.keys.map((key) => key.toLowerCase()));
  const visited = new WeakSet<object>();

  const shouldRedact = (key: string): boolean =>
    keySet.has(key.toLowerCase()) || config.patterns.some((pattern) => pattern.test(key));

  function redactValue(value: unknown, depth: number): unknown {
    if (value === null || typeof value !== 'object' || !config.deep) {
      return value;
    }
    if (depth >= config.maxDepth) {
      return config.maxDepthMarker;
    }
    if (visited.has(value)) {
      return config.circularMarker;
    }
    if (Array.isArray(value)) {
      visited.add(value);
      return value.map((item: unknown) => redactValue(item, depth + 1));
    }
    if (isPlainObject(value)) {
      return redactObject(value, depth + 1);
    }
    // Dates, errors and class instances are passed through
    return value;
  }

  function redactObject(obj: Record<string, unknown>, depth: number): Record<string, unknown> {
    visited.add(obj);
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (UNSAFE_KEYS.has(key)) {
        continue;
      }
      result[key] = shouldRedact(key) ? config.replacement : redactValue(value, depth);
    }

    return result;
  }

  return redactObject(context, 0);
}

/**
 * Validate redaction configuration using Zod schema.
 * Throws ZodError if configuration is invalid.
 */
export function validateRedactionConfig(config: RedactionConfig): ParsedRedactionConfig {
  return redactionConfigSchema.parse(config);
}

/**
 * Create a redaction function with pre-configured settings.
 * The configuration is validated once, up front.
 */
export function createRedactor(config: RedactionConfig): (context: LogContext) => LogContext {
  const parsed = redactionConfigSchema.parse(config);
  return (context) => redactWith(context, parsed);
}

/**
 * Create a redactor with the default HTTP credential keys and patterns.
 *
 * @param additionalKeys - Additional keys to redact
 * @param additionalPatterns - Additional patterns to match
 * @param replacement - Replacement value for redacted fields
 */
export function createDefaultRedactor(
  additionalKeys: readonly string[] = [],
  additionalPatterns: readonly RegExp[] = [],
  replacement = '[REDACTED]'
): (context: LogContext) => LogContext {
  return createRedactor({
    keys: [...DEFAULT_SENSITIVE_KEYS, ...additionalKeys],
    patterns: [...DEFAULT_SENSITIVE_PATTERNS, ...additionalPatterns],
    replacement,
  });
}

function isScopedLogger(logger: RestLogger): logger is ScopedLogger {
  return 'child' in logger && typeof logger.child === 'function';
}

/**
 * Wrap a logger with automatic context redaction.
 * Child loggers keep redacting, and their bindings are redacted too.
 *
 * @param logger - The logger to wrap
 * @param redactor - Function to redact context objects
 */
export function withRedaction(
  logger: ScopedLogger,
  redactor: (context: LogContext) => LogContext
): ScopedLogger;
export function withRedaction(
  logger: RestLogger,
  redactor: (context: LogContext) => LogContext
): RestLogger;
export function withRedaction(
  logger: RestLogger,
  redactor: (context: LogContext) => LogContext
): RestLogger | ScopedLogger {
  const wrap =
    (method: (msg: string, context?: LogContext) => void) =>
    (msg: string, context?: LogContext): void => {
      if (context) {
        method(msg, redactor(context));
      } else {
        method(msg);
      }
    };

  const wrapped: RestLogger = {
    debug: wrap((msg, context) => logger.debug(msg, context)),
    info: wrap((msg, context) => logger.info(msg, context)),
    warn: wrap((msg, context) => logger.warn(msg, context)),
    error: wrap((msg, context) => logger.error(msg, context)),
  };

  if (!isScopedLogger(logger)) {
    return wrapped;
  }

  return {
    ...wrapped,
    child(bindings: LogContext): ScopedLogger {
      return withRedaction(logger.child(redactor(bindings)), redactor);
    },
  };
}

/**
 * Wrap a logger with the default HTTP credential redaction.
 */
export function withDefaultRedaction(
  logger: ScopedLogger,
  additionalKeys?: readonly string[],
  additionalPatterns?: readonly RegExp[]
): ScopedLogger;
export function withDefaultRedaction(
  logger: RestLogger,
  additionalKeys?: readonly string[],
  additionalPatterns?: readonly RegExp[]
): RestLogger;
export function withDefaultRedaction(
  logger: RestLogger,
  additionalKeys: readonly string[] = [],
  additionalPatterns: readonly RegExp[] = []
): RestLogger | ScopedLogger {
  return withRedaction(logger, createDefaultRedactor(additionalKeys, additionalPatterns));
}
