export {
  type LogLevel,
  type LogContext,
  type RestLogger,
  type ScopedLogger,
  type AttemptContext,
  type RequestLogger,
  createRequestLogger,
} from './logger.js';

export {
  type ConsoleLoggerConfig,
  createConsoleLogger,
} from './console.js';

export {
  type PinoLike,
  createPinoLogger,
} from './pino.js';

export {
  noopLogger,
  createNoopLogger,
} from './noop.js';

export {
  type RedactionConfig,
  type ParsedRedactionConfig,
  redactionConfigSchema,
  DEFAULT_SENSITIVE_KEYS,
  DEFAULT_SENSITIVE_PATTERNS,
  redactContext,
  createRedactor,
  createDefaultRedactor,
  withRedaction,
  withDefaultRedaction,
  validateRedactionConfig,
} from './redaction.js';
