import { isRetryable } from '../utils/errors';

export interface RetryOptions {
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (err: unknown, attempt: number, delay_ms: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  max_attempts: 5,
  base_delay_ms: 500,
  max_delay_ms: 10000,
};

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before retrying after the given (1-based) failed attempt
 */
export const backoffDelay = (attempt: number, options: Pick<RetryOptions, 'base_delay_ms' | 'max_delay_ms'>): number => {
  return Math.min(options.max_delay_ms, options.base_delay_ms * 2 ** (attempt - 1));
};

export const withRetry = async <T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  const wait = options.sleep || sleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err) || attempt >= options.max_attempts) {
        throw err;
      }
      const delay_ms = backoffDelay(attempt, options);
      options.onRetry?.(err, attempt, delay_ms);
      await wait(delay_ms);
    }
  }
};
