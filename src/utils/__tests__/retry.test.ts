import { describe, it, expect, vi } from 'vitest';
import { calculateBackoff, withRetry } from '../retry.js';
import { ProviderError, isRetryableError } from '../errors.js';
import { classifyHttpFailure, isRateLimitText, parseRetryAfter } from '../rate-limit.js';

const noSleep = () => vi.fn(async (_ms: number) => undefined);

describe('calculateBackoff', () => {
  it('should double the delay per attempt up to the cap', () => {
    expect(calculateBackoff(0, 100, 1000)).toBe(100);
    expect(calculateBackoff(2, 100, 1000)).toBe(400);
    expect(calculateBackoff(5, 100, 1000)).toBe(1000);
  });

  it('should add jitter from the random source', () => {
    expect(calculateBackoff(1, 100, 10_000, 50, () => 0.5)).toBe(225);
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error(`attempt ${attempt} failed`);
      return 'ok';
    });
    const sleep = noSleep();

    const value = await withRetry(fn, { maxRetries: 3, baseDelayMs: 100, jitterMs: 0, sleep });

    expect(value).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([100, 200]);
  });

  it('should rethrow the last error once retries are exhausted', async () => {
    const error = new Error('still broken');

    await expect(withRetry(async () => { throw error; }, { maxRetries: 1, sleep: noSleep() })).rejects.toBe(error);
  });

  it('should stop when shouldRetry declines', async () => {
    const fn = vi.fn(async () => {
      throw new ProviderError('denied', { kind: 'auth', model: 'openai/gpt-4o' });
    });

    await expect(withRetry(fn, { maxRetries: 5, shouldRetry: isRetryableError, sleep: noSleep() }))
      .rejects.toThrow('denied');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should honour a delayFor longer than maxDelayMs', async () => {
    const sleep = noSleep();
    const onRetry = vi.fn();
    let calls = 0;

    await withRetry(async () => {
      if (calls++ === 0) throw new Error('flaky');
      return 'ok';
    }, { maxRetries: 1, baseDelayMs: 10, maxDelayMs: 2000, jitterMs: 0, delayFor: () => 60_000, onRetry, sleep });

    expect(sleep).toHaveBeenCalledWith(60_000);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 0, 60_000);
  });

  it('should cap the computed backoff at maxDelayMs', async () => {
    const sleep = noSleep();
    let calls = 0;

    await withRetry(async () => {
      if (calls++ < 3) throw new Error('flaky');
      return 'ok';
    }, { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 2500, jitterMs: 0, sleep });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 2500]);
  });
});

describe('rate-limit helpers', () => {
  it('should recognise rate limit wording', () => {
    expect(isRateLimitText('Error: Rate limit exceeded')).toBe(true);
    expect(isRateLimitText('RESOURCE_EXHAUSTED')).toBe(true);
    expect(isRateLimitText('model not found')).toBe(false);
  });

  it('should parse Retry-After seconds and dates', () => {
    expect(parseRetryAfter(new Headers({ 'retry-after': '7' }))).toBe(7000);
    expect(parseRetryAfter(
      new Headers({ 'retry-after': 'Wed, 21 Oct 2026 07:28:10 GMT' }),
      Date.parse('Wed, 21 Oct 2026 07:28:00 GMT')
    )).toBe(10_000);
    expect(parseRetryAfter(new Headers())).toBeNull();
  });

  it('should classify HTTP failures', () => {
    expect(classifyHttpFailure(429, '')).toBe('rate_limit');
    expect(classifyHttpFailure(500, 'overloaded')).toBe('rate_limit');
    expect(classifyHttpFailure(403, 'forbidden')).toBe('auth');
    expect(classifyHttpFailure(408, '')).toBe('timeout');
    expect(classifyHttpFailure(503, 'unavailable')).toBe('server');
    expect(classifyHttpFailure(400, 'bad model')).toBe('bad_request');
  });
});
