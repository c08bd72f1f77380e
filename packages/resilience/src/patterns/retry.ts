/**
 * Retry Pattern
 * Automatically retry failed operations with exponential backoff
 */

import { BackoffStrategy, RetryOptions, RetryResult } from '../types';

export class Retry {
  private maxRetries: number;
  private initialDelay: number;
  private maxDelay: number;
  private backoffMultiplier: number;
  private backoffStrategy: BackoffStrategy;
  private jitter: boolean;
  private shouldRetry: (error: unknown, attempt: number) => boolean;
  private onRetry?: (error: unknown, attempt: number, delay: number) => void;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.initialDelay = options.initialDelay ?? 1000;
    this.maxDelay = options.maxDelay ?? 30000;
    this.backoffMultiplier = options.backoffMultiplier ?? 2;
    this.backoffStrategy = options.backoffStrategy || 'exponential';
    this.jitter = options.jitter ?? true;
    this.shouldRetry = options.shouldRetry || isTransientError;
    this.onRetry = options.onRetry;
  }

  /**
   * Execute function with retry logic
   */
  async execute<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    let attempt = 0;
    let totalDelay = 0;

    for (;;) {
      try {
        const result = await fn();
        return { result, attempts: attempt + 1, totalDelay };
      } catch (error) {
        attempt++;

        if (attempt > this.maxRetries || !this.shouldRetry(error, attempt)) {
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        totalDelay += delay;

        this.onRetry?.(error, attempt, delay);

        await this.sleep(delay);
      }
    }
  }

  /**
   * Calculate delay based on attempt number and strategy
   */
  calculateDelay(attempt: number): number {
    let delay = this.initialDelay;

    switch (this.backoffStrategy) {
      case 'exponential':
        delay = this.initialDelay * Math.pow(this.backoffMultiplier, attempt - 1);
        break;

      case 'linear':
        delay = this.initialDelay * attempt;
        break;
    }

    delay = Math.min(delay, this.maxDelay);

    if (this.jitter) {
      // Random jitter between 0-25% of delay
      delay += delay * 0.25 * Math.random();
    }

    return delay;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Default retry logic - retry on network/timeout errors and 5xx, never on 4xx
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number'
    ? error.statusCode
    : undefined;

  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return false;
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

  return (
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNREFUSED' ||
    error.message.toLowerCase().includes('timeout') ||
    (statusCode !== undefined && statusCode >= 500)
  );
}

/**
 * Create retry helper
 */
export function createRetry(options?: RetryOptions): Retry {
  return new Retry(options);
}
