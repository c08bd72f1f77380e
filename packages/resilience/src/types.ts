/**
 * Type definitions for @lorekeeper/resilience
 */

export type BackoffStrategy = 'exponential' | 'linear' | 'constant';

export interface RetryOptions {
  /** Maximum number of retry attempts after the first call (default: 3) */
  maxRetries?: number;

  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;

  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;

  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;

  backoffStrategy?: BackoffStrategy;

  /** Whether to add up to 25% jitter to each delay (default: true) */
  jitter?: boolean;

  /** Function to determine if error should be retried */
  shouldRetry?: (error: unknown, attempt: number) => boolean;

  /** Callback before retry */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

export interface TimeoutOptions {
  /** Timeout in milliseconds */
  timeout: number;

  /** Custom timeout error */
  timeoutError?: Error;

  /** Callback when timeout occurs */
  onTimeout?: () => void;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelay: number;
}
