/**
 * Retry logic with exponential backoff
 */

import { NetworkError, RateLimitError, ServerError, TimeoutError } from '../errors';

export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  /** Exponential backoff base */
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
}

// Remote failures are not retried unless asked for: re-running the pipeline
// resumes from the chunk checkpoints instead.
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 0,
  initialDelay: 1000,
  maxDelay: 60000,
  exponentialBase: 2,
  jitter: true,
};

/**
 * Calculate delay for the given attempt
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt),
    config.maxDelay
  );

  if (config.jitter) {
    // Add "equal jitter" (aka half jitter): random value between 50% and 100% of delay.
    // See: https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

/**
 * Check if error should trigger retry
 */
export function shouldRetry(attempt: number, error: unknown, config: RetryConfig): boolean {
  if (attempt >= config.maxRetries) {
    return false;
  }

  // Retry network errors, timeouts, rate limits and 5xx
  return (
    error instanceof NetworkError ||
    error instanceof TimeoutError ||
    error instanceof RateLimitError ||
    error instanceof ServerError
  );
}

/**
 * Sleep for specified milliseconds; rejects with the abort reason when signalled
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute function with retry logic
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (error) {
      if (signal?.aborted || !shouldRetry(attempt, error, config)) {
        throw error;
      }

      let delay = calculateDelay(attempt, config);

      // For rate limit errors, use Retry-After header if available (still capped)
      if (error instanceof RateLimitError && error.retryAfter) {
        delay = Math.min(Math.max(delay, error.retryAfter * 1000), config.maxDelay);
      }

      onRetry?.(attempt + 1, error, delay);
      await sleep(delay, signal);
    }
  }
}
