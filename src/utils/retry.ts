/**
 * Retry Utility with Exponential Backoff
 *
 * Request-level retry for provider searches. Scene transfers are never retried
 * here; a failed scene is picked up again by the next scheduled run.
 */

import { isAxiosError } from 'axios';
import { logger } from './logger.js';
import { sleep } from './sleep.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first call (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  isRetryable?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable' | 'signal'>> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

/**
 * Default retryable error detection
 * Retries on 429, 5xx and network errors without a response
 */
export function isRetryableError(error: unknown): boolean {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return error.code !== 'ERR_CANCELED';
    }
    return status === 429 || (status >= 500 && status < 600);
  }

  if (error && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    return code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED';
  }

  return false;
}

export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

function getRetryAfterDelay(error: unknown): number | null {
  if (!isAxiosError(error)) {
    return null;
  }
  const header: unknown = error.response?.headers?.['retry-after'];
  const value = Array.isArray(header) ? header[0] : header;
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const seconds = parseInt(String(value), 10);
  return !isNaN(seconds) && seconds > 0 ? seconds * 1000 : null;
}

/**
 * Retry an operation with exponential backoff
 *
 * @param context - Optional label for logging (e.g. provider name)
 * @throws The last error if all retries are exhausted
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = isRetryableError,
    signal,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 0) {
        logger.info({ attempt: attempt + 1, context }, `Operation succeeded after ${attempt} retry attempts${contextStr}`);
      }
      return result;
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxAttempts) {
        throw error;
      }

      const retryAfter = getRetryAfterDelay(error);
      const delay = retryAfter !== null
        ? Math.min(retryAfter, maxDelay)
        : calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxAttempts + 1,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Operation failed, retrying${contextStr}`
      );

      await sleep(delay, signal);
    }
  }
}
