/**
 * Error conversion
 * Narrow and convert unknown errors to AppErrors
 */

import { AppError } from './base-error';
import {
  ValidationError,
  NotFoundError,
  ConflictError,
  InternalServerError,
  TimeoutError,
} from './errors';

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('timeout') || message.includes('timed out')) {
      return new TimeoutError(error.message, { originalError: error.name });
    }
    if (message.includes('not found')) {
      return new NotFoundError(error.message, { originalError: error.name });
    }
    if (message.includes('conflict') || message.includes('already exists')) {
      return new ConflictError(error.message, { originalError: error.name });
    }
    if (message.includes('validation') || message.includes('invalid')) {
      return new ValidationError(error.message, { originalError: error.name });
    }

    return new InternalServerError(error.message, { originalError: error.name });
  }

  return new InternalServerError('An unexpected error occurred', { error: String(error) });
}
