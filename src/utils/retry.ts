/**
 * Retry Utility with Exponential Backoff
 *
 * Retries transient transport failures (network errors, 429, 5xx) when
 * fetching the reference document. Lookup errors are never retried.
 */

import { isAxiosError } from 'axios';
import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable'>> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ECONNABORTED', 'EAI_AGAIN']);

/**
 * Default retryable error detection
 * Retries on 429, 5xx, responseless axios errors and transient socket codes
 */
function defaultIsRetryable(error: unknown): boolean {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return true;
    }
    return status === 429 || (status >= 500 && status < 600);
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return RETRYABLE_ERROR_CODES.has(error.code);
  }

  return false;
}

function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, URL)
 * @throws The last error if all retries are exhausted or the error is not retryable
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
    isRetryable = defaultIsRetryable,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (!isRetryable(error)) {
        logger.debug(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, error: message, context },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, error: message, context },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      const delay = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);
      logger.warn(
        { attempt: attempt + 1, maxAttempts: maxAttempts + 1, delay, error: message, context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

/**
 * Check if an error is retryable using default logic
 */
export function isRetryableError(error: unknown): boolean {
  return defaultIsRetryable(error);
}
