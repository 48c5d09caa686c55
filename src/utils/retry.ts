import { logger } from './logger';
import { ServiceError, toError } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
}

/** Reads an HTTP status from SDK errors without depending on their classes. */
export function statusOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

function isRetryable(status: number | null): boolean {
  return status === 429 || (status !== null && status >= 500);
}

/**
 * Runs `fn`, retrying rate limits and 5xx responses with exponential backoff.
 * Anything else (timeouts, 4xx) fails immediately as a ServiceError.
 */
export async function callWithRetry<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const status = statusOf(error);

      if (!isRetryable(status) || attempt >= options.maxAttempts) {
        throw new ServiceError(service, operation, toError(error), isRetryable(status));
      }

      const delay = Math.pow(2, attempt - 1) * options.baseDelayMs;
      logger.warn(`${service} ${operation} failed, backing off`, { attempt, delay, status });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
