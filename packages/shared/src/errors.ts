/**
 * Error codes used throughout evalkit.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ExternalCallError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'RuleEvaluationError'
  | 'ParseError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all evalkit errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ExternalCallError', 'Judge request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'openai' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Caller misuse: invalid rule configuration, a custom judgment without criteria,
 * an unreadable config file. Surfaced immediately and never retried.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * The injected model-invocation capability failed (network, auth, quota).
 */
export class ExternalCallError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ExternalCallError', message, options);
  }
}

/**
 * Error thrown when rate limited by a provider API.
 */
export class RateLimitError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('RateLimitError', message, options);
  }
}

/**
 * Error thrown when a provider request times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * A single validation rule failed internally (bad pattern, predicate exception).
 * The validator chain records it against the rule and keeps going.
 */
export class RuleEvaluationError extends AppError {
  /** Name of the rule that failed */
  public readonly ruleName: string;

  constructor(ruleName: string, message: string, options: AppErrorOptions = {}) {
    super('RuleEvaluationError', `Rule "${ruleName}" failed to evaluate: ${message}`, options);
    this.ruleName = ruleName;
  }
}

/**
 * Judge output could not be read as JSON, even after fallback extraction.
 */
export class JudgeParseError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ParseError', message, options);
  }
}

/**
 * Returns a human-readable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
