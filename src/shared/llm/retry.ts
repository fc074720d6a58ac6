/**
 * Transport retry helpers
 *
 * Bounded retry with backoff and a per-attempt timeout, shared by every
 * call site that talks to a text generation endpoint. This is a transport
 * concern only: content-quality retries live in the tailoring pipeline.
 */

import { toError } from '../errors/types';
import { DEFAULT_RETRY_CONFIG, RetryConfig } from './types';

/**
 * Raised when an operation does not settle within its time budget
 */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, operation = 'operation') {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Sleep utility
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run a task against a timer. When the timer fires first the task's signal
 * is aborted with the TimeoutError, so the underlying request stops too.
 * The timer is always cleared.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation?: string
): Promise<T> {
  const controller = new AbortController();
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return task(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs, operation);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

/**
 * Delay before the retry that follows a failed attempt (0-based)
 */
export function backoffDelay(config: RetryConfig, attempt: number): number {
  return config.backoffMs[attempt] ?? config.delayMs;
}

/**
 * Retry logic with backoff.
 *
 * Makes at most `maxAttempts` calls; rethrows the last error once they are
 * used up, or immediately when `shouldRetry` rejects the error.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  retryConfig: Partial<RetryConfig> = {},
  onRetry?: (error: Error, attempt: number, delayMs: number) => void
): Promise<T> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
  const maxAttempts = Math.max(1, config.maxAttempts);
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (config.shouldRetry && !config.shouldRetry(lastError)) {
        throw lastError;
      }

      // Don't wait after the last attempt
      if (attempt === maxAttempts - 1) {
        break;
      }

      const delay = backoffDelay(config, attempt);
      onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay);
    }
  }

  throw lastError ?? new Error('Retry failed');
}
