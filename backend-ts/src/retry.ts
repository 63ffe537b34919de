/**
 * Retry with exponential backoff, for callers that want it.
 *
 * The orchestrator never retries on its own: a batch of N questions with
 * hidden retries would multiply its latency. The CLI and the HTTP API wrap
 * single asks with this when the user asks for retries.
 */

import { TimeoutError, TransportError } from './errors.js';
import { logger } from './logger.js';

export interface RetryOptions {
  retries?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
}

/**
 * Sleep for specified milliseconds.
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Timeouts, dropped connections and overloaded-server statuses are worth
 * another attempt. Validation and malformed responses are not.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }

  if (error instanceof TransportError) {
    if (error.reason === 'connection') {
      return true;
    }
    if (error.reason === 'http' && error.statusCode !== undefined) {
      return error.statusCode === 429 || error.statusCode >= 500;
    }
  }

  return false;
}

/**
 * Execute function with retry logic and exponential backoff.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, label: string, options: RetryOptions = {}): Promise<T> {
  const { retries = 0, initialDelay = 1000, maxDelay = 10000, backoffMultiplier = 2 } = options;

  let delay = initialDelay;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= retries) {
        if (attempt > 0) {
          logger.error(`Giving up on ${label} after ${attempt + 1} attempts: ${error}`);
        }
        throw error;
      }

      const wait = Math.min(delay, maxDelay);
      logger.warn(`Attempt ${attempt + 1}/${retries + 1} failed for ${label}, retrying in ${wait}ms: ${error}`);
      await sleep(wait);
      delay *= backoffMultiplier;
    }
  }
}
