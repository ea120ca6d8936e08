import type { EvalEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout evalkit.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'JudgeCompleted', ... });
 *
 * // Standard logging
 * logger.info('Judged 3 responses');
 * logger.error(new Error('Failed'), 'Comparison failed');
 * ```
 */
export interface Logger {
  /**
   * Persist a structured evaluation event. Implementations report their own
   * failures instead of throwing.
   */
  log(event: EvalEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;
}
