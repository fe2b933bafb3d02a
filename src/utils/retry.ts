import { logger } from './logger.js';
import { errorMessage } from './errors.js';

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  /** Delay before the second attempt; doubles every attempt after that */
  baseDelayMs: number;
  /** Label used in log lines */
  label: string;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown) => boolean;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `fn` with exponential backoff: baseDelay, 2x, 4x...
 * Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }

      logger.warn(`${options.label} failed`, {
        attempt,
        maxAttempts: attempts,
        error: errorMessage(error),
      });

      if (attempt < attempts) {
        const delay = Math.pow(2, attempt - 1) * options.baseDelayMs;
        logger.debug('Retrying after delay', { label: options.label, delay });
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
