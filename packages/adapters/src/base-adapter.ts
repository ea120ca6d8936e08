import {
  AppError,
  ConfigError,
  ExternalCallError,
  RateLimitError,
  TimeoutError,
  errorMessage,
} from '@evalkit/shared';

/**
 * Interface for API error types that have a status code.
 * Used by the base adapter to handle common error mapping.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Configuration for error type checking in provider adapters.
 * Each provider can supply its own error class checks.
 */
export interface ErrorTypeConfig {
  /** Check if the error is an API error with status code */
  isAPIError: (error: unknown) => error is APIErrorLike;
  /** Check if the error is a connection timeout error */
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for LLM provider adapters that provides common error mapping logic.
 * Subclasses should configure error type checks for their specific SDK.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  /**
   * Maps provider-specific errors to standardized errors:
   * - 429 status -> RateLimitError
   * - 401 status -> ConfigError
   * - Timeout errors -> TimeoutError
   * - `AppError`s pass through
   * - Anything else -> ExternalCallError carrying the original as `cause`
   */
  protected mapError(error: unknown, provider: string): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(errorMessage(error), { cause: error });
    }

    const status = this.errorConfig.isAPIError(error) ? error.status : undefined;
    return new ExternalCallError(`${provider} request failed: ${errorMessage(error)}`, {
      cause: error,
      details: status === undefined ? { provider } : { provider, status },
    });
  }
}
