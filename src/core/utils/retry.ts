/**
 * Retry utility with exponential backoff
 *
 * Used inside collectors for throttled provider calls. The scheduler never
 * retries a work unit itself.
 */

import { getErrorName, RETRYABLE_ERRORS } from "../errors.js";

export interface RetryOptions {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Error names/codes that are retryable (if empty, all errors are retryable) */
  retryableErrors?: string[];
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableErrors: RETRYABLE_ERRORS,
};

/**
 * Check if an error is retryable based on the options
 */
function isRetryableError(error: unknown, retryableErrors?: string[]): boolean {
  if (!retryableErrors || retryableErrors.length === 0) {
    return true;
  }

  const errorName = getErrorName(error);
  const errorMessage = error instanceof Error ? error.message : "";

  return retryableErrors.some(
    (e) => errorName === e || errorMessage.includes(e)
  );
}

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an operation with retry logic and exponential backoff
 *
 * @param operation - Async function to execute
 * @param options - Retry configuration options
 * @param onRetry - Optional callback called before each retry
 * @returns The result of the operation
 * @throws The last error if all retries are exhausted
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {},
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier, retryableErrors } = opts;

  let delay = initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      // Out of attempts, or not worth another one
      if (attempt >= maxRetries || !isRetryableError(error, retryableErrors)) {
        throw error;
      }

      onRetry?.(attempt + 1, error, delay);

      await sleep(delay);

      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}
