/**
 * Retry utilities for handling retryable operations
 *
 * Exponential backoff with jitter, used by the network byte fetcher.
 */

import { AppError } from '../errors/baseErrors';
import type { Logger } from './logging';

/**
 * Configuration options for retry operations
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts?: number;
  /** Initial delay between retries in milliseconds (default: 200) */
  initialDelayMs?: number;
  /** Maximum delay between retries in milliseconds (default: 2000) */
  maxDelayMs?: number;
  /** Backoff factor for exponential backoff (default: 2) */
  backoffFactor?: number;
  /** Jitter factor to add randomness to retry delays (0-1, default: 0.1) */
  jitterFactor?: number;
  /** Function to determine if an error is retryable (default: check error.retryable) */
  isRetryable?: (error: unknown) => boolean;
  /** Stops further attempts once aborted */
  signal?: AbortSignal;
  logger?: Logger;
}

const DEFAULT_RETRY_OPTIONS: Required<Omit<RetryOptions, 'logger' | 'isRetryable' | 'signal'>> = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  backoffFactor: 2,
  jitterFactor: 0.1
};

/**
 * Default function to determine if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }

  return false;
}

/**
 * Calculate delay for the next retry attempt with exponential backoff and jitter
 *
 * @param attempt Zero-based index of the retry (0 is the first retry)
 */
export function calculateBackoff(
  attempt: number,
  options: RetryOptions = {}
): number {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  const exponentialDelay = opts.initialDelayMs * Math.pow(opts.backoffFactor, attempt);
  const cappedDelay = Math.min(exponentialDelay, opts.maxDelayMs);

  // Jitter keeps many clients from retrying in lockstep
  const jitter = opts.jitterFactor * cappedDelay * (Math.random() * 2 - 1);

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
 * Wait for `ms`, or less if `signal` aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic
 *
 * @param operation The async function to retry
 * @param options Retry configuration options
 * @returns Promise that resolves with the operation result
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const maxAttempts = opts.maxAttempts;
  const logger = opts.logger;
  const isRetryable = opts.isRetryable || isRetryableError;

  let attempt = 0;
  let lastError: unknown;

  while (attempt < maxAttempts) {
    try {
      if (attempt > 0) {
        logger?.debug(`Retry attempt ${attempt} of ${maxAttempts}`, {
          attempt,
          maxAttempts
        });
      }

      return await operation();
    } catch (error) {
      lastError = error;

      if (!isRetryable(error) || opts.signal?.aborted) {
        throw error;
      }

      attempt++;
      if (attempt >= maxAttempts) {
        break;
      }

      const delay = calculateBackoff(attempt - 1, opts);
      logger?.debug('Operation failed, waiting before retry', {
        attempt,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error)
      });
      await sleep(delay, opts.signal);
      if (opts.signal?.aborted) {
        throw error;
      }
    }
  }

  logger?.warn(`All ${maxAttempts} attempts failed`, {
    maxAttempts,
    error: lastError instanceof Error ? lastError.message : String(lastError)
  });

  throw lastError;
}
