import { getLogger } from './logger.js';
import { RETRYABLE_NETWORK_CODES } from './constants.js';

const log = getLogger('http', { component: 'retry' });

export interface NetworkRetryOptions {
  /** Attempts including the first call. */
  maxAttempts: number;
  /** Delay before the first retry; doubles after each one. */
  baseDelayMs: number;
}

/** Connection resets and refusals. Timeouts and HTTP statuses are final. */
export function isRetryableNetworkError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && RETRYABLE_NETWORK_CODES.includes(String(error.code));
}

/**
 * Runs `fn`, retrying with exponential backoff while it fails with a
 * retryable connection error. Any other error is rethrown at once.
 */
export async function withNetworkRetry<T>(fn: () => Promise<T>, options: NetworkRetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryableNetworkError(error)) {
        throw error;
      }

      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      log.warn({ attempt, maxAttempts, delayMs, err: error }, 'Connection failed, retrying');
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
