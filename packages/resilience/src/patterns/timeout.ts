/**
 * Timeout Pattern
 * Execute operations with time limits
 */

import { TimeoutOptions } from '../types';

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Execute function with timeout. The timer is cleared once the race settles.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeout, timeoutError, onTimeout } = options;
  let timer: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      fn(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          onTimeout?.();
          reject(timeoutError || new TimeoutError(
            `Operation timed out after ${timeout}ms`,
            timeout
          ));
        }, timeout);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
