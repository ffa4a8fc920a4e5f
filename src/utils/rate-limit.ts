// src/utils/rate-limit.ts

import type { ProviderErrorKind } from './errors.js';

// Some proxies answer rate limits with a 200/5xx and a descriptive body.
const RATE_LIMIT_PATTERNS = [
  /rate.?limit/i,
  /too.?many.?requests/i,
  /quota.?exceeded/i,
  /resource.?exhausted/i,
  /overloaded/i
];

export function isRateLimitText(text: string): boolean {
  return RATE_LIMIT_PATTERNS.some(pattern => pattern.test(text));
}

export function parseRetryAfter(headers: Headers, now: number = Date.now()): number | null {
  const retryAfter = headers.get('retry-after');
  if (!retryAfter) return null;

  // Seconds
  if (/^\d+$/.test(retryAfter.trim())) {
    return parseInt(retryAfter, 10) * 1000;
  }

  // HTTP date
  const date = new Date(retryAfter);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return null;
}

/**
 * Maps a non-2xx HTTP status (and its body) to a provider error kind.
 */
export function classifyHttpFailure(status: number, body: string): ProviderErrorKind {
  if (status === 429 || isRateLimitText(body)) return 'rate_limit';
  if (status === 401 || status === 403) return 'auth';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server';
  return 'bad_request';
}
