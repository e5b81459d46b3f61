import { BaseError } from './errors.js';

/**
 * Response envelope printed by the margin command-line tools
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  error?: string;
  errorCode?: string;
  errorDetails?: Record<string, unknown>;
  data?: T;
}

export function createSuccess<T>(data: T): StandardResponse<T> {
  return { success: true, data };
}

/**
 * Create an error response, optionally with a structured error code and details.
 */
export function createError(
  error: string,
  errorCode?: string,
  errorDetails?: Record<string, unknown>,
): StandardResponse<never> {
  const response: StandardResponse<never> = { success: false, error };
  if (errorCode !== undefined) response.errorCode = errorCode;
  if (errorDetails !== undefined) response.errorDetails = errorDetails;
  return response;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create error from caught exception.
 * BaseError subclasses keep their code; record-shaped details are copied,
 * anything else is nested under `value`.
 */
export function createErrorFromException(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV === 'development',
): StandardResponse<never> {
  if (error instanceof BaseError) {
    let details: Record<string, unknown> | undefined;
    if (isRecord(error.details)) {
      details = { ...error.details };
    } else if (error.details !== undefined) {
      details = { value: error.details };
    }
    if (includeStack && error.stack) {
      details = { ...details, stack: error.stack };
    }
    return createError(error.message, error.code, details);
  }

  if (error instanceof Error) {
    const details = includeStack && error.stack ? { stack: error.stack } : undefined;
    return createError(error.message, 'INTERNAL_ERROR', details);
  }

  if (typeof error === 'string') {
    return createError(error, 'UNKNOWN_ERROR');
  }

  return createError(String(error) || 'Unknown error occurred', 'UNKNOWN_ERROR');
}
