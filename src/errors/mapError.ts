import { z } from 'zod';
import { AppError } from './AppError.js';

const OPENAI_ERROR_NAMES = new Set([
  'APIError',
  'BadRequestError',
  'AuthenticationError',
  'PermissionDeniedError',
  'NotFoundError',
  'ConflictError',
  'UnprocessableEntityError',
  'RateLimitError',
  'InternalServerError',
  'APIConnectionError',
  'APITimeoutError',
  'APIConnectionTimeoutError',
]);

/**
 * OpenAI SDK errors are recognised by class name; status is optional.
 */
function isOpenAiError(error: Error): error is Error & { status?: number } {
  return OPENAI_ERROR_NAMES.has(error.name);
}

function openAiStatus(error: Error & { status?: number }): number | undefined {
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Map an unknown error to an AppError:
 * - AppError passes through
 * - ZodError becomes a validation error listing each issue
 * - OpenAI SDK errors by name / status
 * - everything else is internal
 */
export function mapError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof z.ZodError) {
    const messages = error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    return AppError.validation(messages.join(', '), {
      issues: error.issues.map((issue) => ({
        path: issue.path,
        message: issue.message,
        code: issue.code,
      })),
    }, error);
  }

  if (!(error instanceof Error)) {
    const message = typeof error === 'string' ? error : 'Unknown error';
    return AppError.internal(message);
  }

  if (isOpenAiError(error)) {
    const status = openAiStatus(error);

    if (error.name === 'RateLimitError' || status === 429) {
      return AppError.openaiRateLimit(error);
    }

    if (error.name === 'APITimeoutError' || error.name === 'APIConnectionTimeoutError') {
      return AppError.openaiTimeout(undefined, error);
    }

    if (error.name === 'APIConnectionError') {
      const message = error.message.toLowerCase();
      if (message.includes('timed out') || message.includes('timeout')) {
        return AppError.openaiTimeout(undefined, error);
      }
      return AppError.openai('Connection to OpenAI failed', {}, error);
    }

    if (error.name === 'AuthenticationError' || status === 401) {
      return AppError.openai('OpenAI authentication failed', { status }, error);
    }

    if (error.name === 'InternalServerError' || (status !== undefined && status >= 500)) {
      return AppError.openai('OpenAI service error', { status }, error);
    }

    return AppError.openai(error.message, { status }, error);
  }

  return AppError.internal(error.message, error);
}

const SENSITIVE_KEYS = [
  'token',
  'secret',
  'password',
  'apikey',
  'api_key',
  'authorization',
  'bearer',
  'credential',
];

const MAX_LOGGED_STRING = 500;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sanitize error details for logging: secrets redacted, long strings cut.
 */
export function sanitizeForLogging(
  details: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!details) return undefined;

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(details)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string' && value.length > MAX_LOGGED_STRING) {
      sanitized[key] = value.substring(0, MAX_LOGGED_STRING) + '...[truncated]';
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeForLogging(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
