import { type ScopedLogger, type LogContext } from './logger.js';

/**
 * Pino logger instance type.
 * A minimal structural interface, so pino itself is not a dependency.
 */
export interface PinoLike {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;
  child(bindings: object): PinoLike;
}

function forward(
  withContext: (obj: object, msg: string) => void,
  bare: (msg: string) => void,
  msg: string,
  context?: LogContext
): void {
  if (context && Object.keys(context).length > 0) {
    withContext(context, msg);
  } else {
    bare(msg);
  }
}

/**
 * Create a logger adapter for pino.
 *
 * @param pinoInstance - Pino logger instance
 * @returns Logger that delegates to pino, context first as pino expects
 *
 * @example
 * ```typescript
 * import pino from 'pino';
 * import { createPinoLogger } from '@chainrest/logging';
 *
 * const request = createRequest('GET', 'https://api.example.test/items')
 *   .setLogger(createPinoLogger(pino()));
 * ```
 */
export function createPinoLogger(pinoInstance: PinoLike): ScopedLogger {
  return {
    debug: (msg, context) =>
      forward((o, m) => pinoInstance.debug(o, m), (m) => pinoInstance.debug(m), msg, context),
    info: (msg, context) =>
      forward((o, m) => pinoInstance.info(o, m), (m) => pinoInstance.info(m), msg, context),
    warn: (msg, context) =>
      forward((o, m) => pinoInstance.warn(o, m), (m) => pinoInstance.warn(m), msg, context),
    error: (msg, context) =>
      forward((o, m) => pinoInstance.error(o, m), (m) => pinoInstance.error(m), msg, context),
    child(bindings: LogContext): ScopedLogger {
      return createPinoLogger(pinoInstance.child(bindings));
    },
  };
}
