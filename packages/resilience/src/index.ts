/**
 * @lorekeeper/resilience
 * Resilience patterns for lorekeeper services
 */

export { Retry, createRetry, isTransientError } from './patterns/retry';
export { withTimeout, TimeoutError } from './patterns/timeout';

export type {
  BackoffStrategy,
  RetryOptions,
  RetryResult,
  TimeoutOptions,
} from './types';
