// src/utils/retry.ts

import { logger } from './logger.js';
import { toError } from './errors.js';

export interface RetryOptions {
  /** Retries after the first attempt; 0 disables retrying */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound of the random jitter added to each delay */
  jitterMs?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Lets a caller honour a server-provided delay (e.g. Retry-After) */
  delayFor?: (error: unknown, attempt: number, computedDelayMs: number) => number;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export const DEFAULT_RETRY = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30_000
} as const;

const defaultOptions: Required<RetryOptions> = {
  ...DEFAULT_RETRY,
  jitterMs: 1000,
  shouldRetry: () => true,
  delayFor: (_error, _attempt, computedDelayMs) => computedDelayMs,
  onRetry: () => undefined,
  sleep
};

/**
 * Exponential backoff with jitter, capped at maxDelay.
 */
export function calculateBackoff(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
  jitterMs: number = 0,
  random: () => number = Math.random
): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt);
  const jitter = jitterMs > 0 ? random() * jitterMs : 0;
  return Math.min(exponentialDelay + jitter, maxDelay);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts: Required<RetryOptions> = { ...defaultOptions, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const lastError = toError(error);

      if (!opts.shouldRetry(error, attempt)) {
        logger.debug({ attempt, error: lastError.message }, 'Retry condition not met, throwing');
        throw lastError;
      }

      if (attempt >= opts.maxRetries) {
        logger.error({ attempt, error: lastError.message }, 'All retries exhausted');
        throw lastError;
      }

      const computed = calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.jitterMs);
      // maxDelayMs bounds the backoff only; a server-requested delay is honoured as given.
      const delay = Math.max(0, opts.delayFor(error, attempt, computed));
      logger.debug({ attempt, delayMs: delay }, 'Retrying after delay');
      opts.onRetry(lastError, attempt, delay);
      await opts.sleep(delay);
    }
  }
}
