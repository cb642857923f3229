/**
 * Type guard and conversion of unknown errors
 */

import { AppError } from './base-error';
import { InternalError } from './errors';

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Anything that is not already an AppError is an unexpected failure.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalError: error.name });
  }

  return new InternalError('An unexpected error occurred', { error: String(error) });
}
