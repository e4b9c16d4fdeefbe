/**
 * Retry Service
 *
 * Exponential backoff with jitter for calls to the routing and geocoding
 * providers. Only transient failures are retried; anything else surfaces on
 * the first attempt so the caller can fall back.
 *
 * Defaults:
 *   max attempts : 3
 *   base delay   : 250 ms
 *   max delay    : 2 s
 *   jitter       : uniform random in [0, min(base * 0.5, 500ms)]
 *
 *   delay(n) = min(base * 2^(n-1), maxDelay) + jitter
 */

import { logger } from '../utils/logger';

export interface RetryOptions {
  /** Maximum number of attempts, the first one included. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Label used in log messages. */
  context?: string;
  isRetryable?: (error: unknown) => boolean;
}

const DEFAULTS: Required<Omit<RetryOptions, 'context' | 'isRetryable'>> = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 2_000,
};

const TRANSIENT_MARKERS = [
  'econnrefused',
  'econnreset',
  'etimedout',
  'enotfound',
  'enetunreach',
  'socket hang up',
  'fetch failed',
  'network',
  'timeout',
  'timed out',
  'aborted',
  'temporarily unavailable',
  'service unavailable',
  'too many requests',
];

/**
 * True when the error looks like a condition that may clear on its own:
 * network and DNS failures, timeouts, aborted requests, 5xx and 429 replies.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const msg = `${error.name} ${error.message}`.toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => msg.includes(marker));
}

/**
 * Delay before the next attempt.
 *
 * @param attempt 1-indexed attempt number that just failed
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  const jitterCap = Math.min(baseDelayMs * 0.5, 500);
  return Math.round(exponential + Math.random() * jitterCap);
}

/**
 * Runs `operation`, retrying transient failures with backoff. The last error is
 * re-thrown once attempts run out.
 *
 * @example
 * const body = await retryWithBackoff(() => fetchRoute(url), { context: 'azure-maps.route' });
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
  const context = options.context ?? 'operation';
  const classifier = options.isRetryable ?? isTransientError;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const result = await operation();

      if (attempt > 1) {
        logger.info('Retry succeeded', { context, attempt });
      }

      return result;
    } catch (error) {
      lastError = error;
      const reason = error instanceof Error ? error.message : String(error);

      if (!classifier(error)) {
        logger.warn('Non-transient error, not retrying', { context, attempt, error: reason });
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.error('All retry attempts exhausted', { context, attempts: attempt, finalError: reason });
        break;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      logger.warn('Transient error, retrying with backoff', {
        context,
        attempt,
        maxAttempts,
        delayMs,
        reason,
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
