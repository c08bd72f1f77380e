/**
 * Specific Error Classes
 * Generic HTTP-shaped errors plus the deduplication domain taxonomy
 */

import { AppError, ErrorContext, ErrorSeverity } from './base-error';

// Base error classes
export class ValidationError extends AppError {
  code = 'VALIDATION_ERROR';
  statusCode = 400;
  severity = ErrorSeverity.LOW;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Check your input parameters and try again');
  }
}

export class NotFoundError extends AppError {
  code = 'NOT_FOUND';
  statusCode = 404;
  severity = ErrorSeverity.LOW;

  constructor(message: string, context?: ErrorContext, suggestion?: string) {
    super(message, context, suggestion || 'Verify the resource ID and try again');
  }
}

export class ConflictError extends AppError {
  code = 'CONFLICT';
  statusCode = 409;
  severity = ErrorSeverity.MEDIUM;

  constructor(message: string, context?: ErrorContext, suggestion?: string) {
    super(message, context, suggestion || 'Resource already exists or is in use');
  }
}

export class InternalServerError extends AppError {
  code = 'INTERNAL_SERVER_ERROR';
  statusCode = 500;
  severity = ErrorSeverity.HIGH;

  constructor(message: string, context?: ErrorContext, suggestion?: string) {
    super(message, context, suggestion || 'An unexpected error occurred. Please try again later');
  }
}

export class ServiceUnavailableError extends AppError {
  code = 'SERVICE_UNAVAILABLE';
  statusCode = 503;
  severity = ErrorSeverity.HIGH;

  constructor(message: string, context?: ErrorContext, suggestion?: string) {
    super(message, context, suggestion || 'Service is temporarily unavailable');
  }
}

export class TimeoutError extends AppError {
  code = 'TIMEOUT';
  statusCode = 504;
  severity = ErrorSeverity.MEDIUM;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Operation timed out. Please try again');
  }
}

export class ConfigurationError extends InternalServerError {
  code = 'CONFIGURATION_ERROR';
  severity = ErrorSeverity.CRITICAL;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Fix the environment variables listed in the error context');
  }
}

// Deduplication domain errors

/**
 * Embedding gateway, vector index or graph store could not be reached in time.
 * Callers in the dedup pipeline degrade to create-as-new on this error.
 */
export class DependencyUnavailableError extends ServiceUnavailableError {
  code = 'DEPENDENCY_UNAVAILABLE';
  readonly dependency: string;

  constructor(dependency: string, operation: string, originalError?: unknown, context?: ErrorContext) {
    super(
      `Dependency unavailable: ${dependency} (${operation})`,
      { ...context, dependency, operation, originalError: describeCause(originalError) },
      `Check ${dependency} connectivity`
    );
    this.dependency = dependency;
  }
}

export class ProviderError extends AppError {
  code = 'PROVIDER_ERROR';
  statusCode = 502;
  severity = ErrorSeverity.MEDIUM;
  readonly provider: string;

  constructor(provider: string, message: string, context?: ErrorContext) {
    super(`${provider}: ${message}`, { ...context, provider }, `Check ${provider} API status and credentials`);
    this.provider = provider;
  }
}

export class SessionNotFoundError extends NotFoundError {
  code = 'SESSION_NOT_FOUND';

  constructor(sessionToken: string) {
    super(
      'Deduplication session not found',
      { sessionToken },
      'Re-submit the note to restart deduplication'
    );
  }
}

export class SessionExpiredError extends AppError {
  code = 'SESSION_EXPIRED';
  statusCode = 410;
  severity = ErrorSeverity.LOW;

  constructor(sessionToken: string, expiredAt: string) {
    super(
      'Deduplication session expired',
      { sessionToken, expiredAt },
      'Re-submit the note to restart deduplication'
    );
  }
}

export class InvalidMergeTargetError extends ConflictError {
  code = 'INVALID_MERGE_TARGET';

  constructor(targetId: string, reason: string) {
    super(`Invalid merge target ${targetId}: ${reason}`, { targetId, reason }, 'The target changed after adjudication');
  }
}

export class MergeFailedError extends InternalServerError {
  code = 'MERGE_FAILED';

  constructor(targetId: string, attempts: number, originalError?: unknown) {
    super(`Merge into ${targetId} failed after ${attempts} attempts`, {
      targetId,
      attempts,
      originalError: describeCause(originalError)
    });
  }
}

function describeCause(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
}
