/**
 * @lorekeeper/errors
 * Unified error hierarchy for lorekeeper services
 */

export { AppError, ErrorSeverity } from './base-error';
export type { ErrorContext, SerializedError } from './base-error';
export {
  ValidationError,
  NotFoundError,
  ConflictError,
  InternalServerError,
  ServiceUnavailableError,
  TimeoutError,
  ConfigurationError,
  DependencyUnavailableError,
  ProviderError,
  SessionNotFoundError,
  SessionExpiredError,
  InvalidMergeTargetError,
  MergeFailedError,
} from './errors';
export { isAppError, toAppError } from './factory';
