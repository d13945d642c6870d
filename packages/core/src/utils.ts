import { TimeoutError, toError } from './errors.js';
import { type TextValue } from './types.js';

/**
 * A static never-aborted AbortSignal for use when no signal is provided.
 */
export const NEVER_ABORTED_SIGNAL: AbortSignal = new AbortController().signal;

/** Longest delay a single timer accepts; Node fires longer ones after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Run `callback` after `ms`, chaining timers past {@link MAX_TIMER_DELAY_MS}.
 *
 * @returns A function that cancels the pending timer
 */
export function scheduleTimer(ms: number, callback: () => void): () => void {
  let handle: ReturnType<typeof setTimeout> | undefined;
  const arm = (remaining: number): void => {
    if (remaining > MAX_TIMER_DELAY_MS) {
      handle = setTimeout(() => arm(remaining - MAX_TIMER_DELAY_MS), MAX_TIMER_DELAY_MS);
    } else {
      handle = setTimeout(callback, remaining);
    }
  };
  arm(ms);
  return () => clearTimeout(handle);
}

/**
 * Sleep for a specified duration with optional cancellation support.
 *
 * @param ms - Duration in milliseconds
 * @param signal - Optional AbortSignal for cancellation
 * @returns Promise that resolves after the delay or rejects if cancelled
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      cancel();
      reject(abortReason(signal));
    };

    const cancel = scheduleTimer(ms, () => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    });

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * The reason an aborted signal carries, as an Error.
 */
export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason === undefined) {
    return new Error('The operation was aborted');
  }
  return toError(reason);
}

/**
 * Execute an operation with a timeout, passing the combined signal to the operation.
 *
 * The returned promise settles as soon as the combined signal aborts, even if
 * the operation ignores its signal. A `ms` of 0 disables the timer.
 *
 * @template T - The operation return type
 * @param operation - The operation to execute
 * @param ms - Timeout duration in milliseconds
 * @param signal - Optional external AbortSignal for cancellation
 * @returns Promise that resolves with the result or rejects with TimeoutError
 */
export async function executeWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    throw abortReason(signal);
  }

  const controller = new AbortController();
  const combinedSignal = combineSignals(signal, controller.signal);

  const cancelTimer = ms > 0
    ? scheduleTimer(ms, () => {
        controller.abort(new TimeoutError(`Request timed out after ${String(ms)}ms`, ms));
      })
    : undefined;

  const listeners: (() => void)[] = [];
  const aborted = new Promise<never>((_, reject) => {
    const listener = (): void => reject(abortReason(combinedSignal));
    listeners.push(listener);
    combinedSignal.addEventListener('abort', listener, { once: true });
  });

  try {
    return await Promise.race([operation(combinedSignal), aborted]);
  } finally {
    cancelTimer?.();
    for (const listener of listeners) {
      combinedSignal.removeEventListener('abort', listener);
    }
  }
}

/**
 * Combine multiple AbortSignals into one.
 * Returns a signal that aborts when any of the input signals abort.
 *
 * @param signals - AbortSignals to combine (undefined values are filtered out)
 * @returns Combined AbortSignal
 */
export function combineSignals(...signals: (AbortSignal | undefined)[]): AbortSignal {
  const validSignals = signals.filter((s): s is AbortSignal => s !== undefined);

  const [first] = validSignals;
  if (first === undefined) {
    return NEVER_ABORTED_SIGNAL;
  }
  if (validSignals.length === 1) {
    return first;
  }

  return AbortSignal.any(validSignals);
}

/**
 * Render a value as text the way it naturally prints:
 * strings as is, numbers, booleans and bigints via String(), dates as ISO-8601.
 */
export function toText(value: TextValue): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

/**
 * Get current timestamp in milliseconds.
 * Uses performance.now() if available for higher precision.
 */
export function now(): number {
  if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
    return performance.now();
  }
  return Date.now();
}
