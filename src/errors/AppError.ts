/**
 * Error categories for the application.
 */
export type ErrorCategory =
  | 'OPENAI'
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INTERNAL';

/**
 * Error codes for more specific error identification.
 * Format: CATEGORY_SPECIFIC_ERROR
 */
export type ErrorCode =
  | 'OPENAI_API_ERROR'
  | 'OPENAI_RATE_LIMIT'
  | 'OPENAI_TIMEOUT'
  | 'VALIDATION_REQUEST_INVALID'
  | 'NOT_FOUND_RESOURCE'
  | 'INTERNAL_ERROR';

export interface AppErrorOptions {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus: number;
  safeMessage: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Structured error response payload for API responses.
 */
export interface ErrorPayload {
  error: {
    category: ErrorCategory;
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
}

/**
 * Base error for everything the HTTP layer reports. `safeMessage` is what
 * clients see; `details` may carry diagnostics and is sanitized before logging.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly safeMessage: string;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.safeMessage);
    this.name = 'AppError';
    this.category = options.category;
    this.code = options.code;
    this.httpStatus = options.httpStatus;
    this.safeMessage = options.safeMessage;
    this.details = options.details;
    this.cause = options.cause;

    Object.setPrototypeOf(this, AppError.prototype);
  }

  toPayload(requestId?: string): ErrorPayload {
    const payload: ErrorPayload = {
      error: {
        category: this.category,
        code: this.code,
        message: this.safeMessage,
      },
    };

    if (this.details && Object.keys(this.details).length > 0) {
      payload.error.details = this.details;
    }

    if (requestId) {
      payload.requestId = requestId;
    }

    return payload;
  }

  static validation(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_REQUEST_INVALID',
      httpStatus: 400,
      safeMessage: message,
      details,
      cause,
    });
  }

  /**
   * A named resource (review, comparison entry, recommendation) does not exist.
   */
  static notFound(resource: string, id: string | number): AppError {
    return new AppError({
      category: 'NOT_FOUND',
      code: 'NOT_FOUND_RESOURCE',
      httpStatus: 404,
      safeMessage: `${resource} not found`,
      details: { resource, id },
    });
  }

  static openai(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_API_ERROR',
      httpStatus: 503,
      safeMessage: 'The AI service is temporarily unavailable. Please try again later.',
      details: { originalMessage: message, ...details },
      cause,
    });
  }

  static openaiRateLimit(cause?: Error): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_RATE_LIMIT',
      httpStatus: 429,
      safeMessage: 'The AI service is currently busy. Please try again in a moment.',
      cause,
    });
  }

  /**
   * Used when the SDK gives up waiting (APITimeoutError or APIConnectionTimeoutError).
   */
  static openaiTimeout(
    details?: { elapsedMs?: number; timeoutMs?: number },
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_TIMEOUT',
      httpStatus: 504,
      safeMessage: 'Model took too long to respond. Please retry.',
      details,
      cause,
    });
  }

  static internal(message: string, cause?: Error): AppError {
    return new AppError({
      category: 'INTERNAL',
      code: 'INTERNAL_ERROR',
      httpStatus: 500,
      safeMessage: 'An unexpected error occurred. Please try again later.',
      details: { originalMessage: message },
      cause,
    });
  }
}
