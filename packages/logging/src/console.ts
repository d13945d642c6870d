import { type ScopedLogger, type LogContext, type LogLevel } from './logger.js';

/**
 * Keys that should never be merged to prevent prototype pollution.
 */
const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Merge context objects, filtering out prototype pollution keys.
 */
function safeContextMerge(...contexts: (LogContext | undefined)[]): LogContext {
  const result: LogContext = {};

  for (const context of contexts) {
    if (!context) continue;

    for (const key of Object.keys(context)) {
      if (!UNSAFE_KEYS.has(key)) {
        result[key] = context[key];
      }
    }
  }

  return result;
}

/**
 * Console logger configuration.
 */
export interface ConsoleLoggerConfig {
  /** Minimum log level to output (default: 'info') */
  level?: LogLevel;
  /** Whether to include timestamps (default: true) */
  timestamps?: boolean;
  /** Whether to output as JSON (default: false) */
  json?: boolean;
  /** Custom prefix for log messages */
  prefix?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Create a console-based logger.
 *
 * Text lines look like `[2024-01-01T00:00:00.000Z] [http] [WARN] msg {"attempt":1}`;
 * JSON lines carry `level`, `timestamp`, `prefix`, `msg` and the context fields.
 *
 * @param config - Logger configuration
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): ScopedLogger {
  return buildConsoleLogger(config, {});
}

function buildConsoleLogger(config: ConsoleLoggerConfig, bound: LogContext): ScopedLogger {
  const level = config.level ?? 'info';
  const timestamps = config.timestamps ?? true;
  const json = config.json ?? false;
  const prefix = config.prefix ?? '';
  const minLevel = LOG_LEVELS[level];

  function format(logLevel: LogLevel, msg: string, context?: LogContext): string {
    const timestamp = timestamps ? new Date().toISOString() : undefined;
    const merged = safeContextMerge(bound, context);
    const hasContext = Object.keys(merged).length > 0;

    if (json) {
      return JSON.stringify({
        level: logLevel,
        ...(timestamp ? { timestamp } : {}),
        ...(prefix ? { prefix } : {}),
        msg,
        ...merged,
      });
    }

    const parts: string[] = [];
    if (timestamp) parts.push(`[${timestamp}]`);
    if (prefix) parts.push(`[${prefix}]`);
    parts.push(`[${logLevel.toUpperCase()}]`, msg);
    if (hasContext) parts.push(JSON.stringify(merged));
    return parts.join(' ');
  }

  function log(logLevel: LogLevel, msg: string, context?: LogContext): void {
    if (LOG_LEVELS[logLevel] >= minLevel) {
      WRITERS[logLevel](format(logLevel, msg, context));
    }
  }

  return {
    debug: (msg, context) => log('debug', msg, context),
    info: (msg, context) => log('info', msg, context),
    warn: (msg, context) => log('warn', msg, context),
    error: (msg, context) => log('error', msg, context),
    child(bindings: LogContext): ScopedLogger {
      return buildConsoleLogger(config, safeContextMerge(bound, bindings));
    },
  };
}
