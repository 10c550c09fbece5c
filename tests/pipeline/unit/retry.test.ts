import { describe, it, expect, vi } from 'vitest';

import { createRetryWrapper, isRetryableError, sleep, withRetry } from '../../../src/ai/pipeline/retry';
import { StepExecutionError } from '../../../src/ai/pipeline/types';

describe('isRetryableError', () => {
  it('returns true for rate limit errors', () => {
    expect(isRetryableError(new Error('Rate limit exceeded'))).toBe(true);
    expect(isRetryableError(new Error('Too many requests'))).toBe(true);
    expect(isRetryableError(new Error('429 error'))).toBe(true);
  });

  it('returns true for network errors', () => {
    expect(isRetryableError(new Error('Network error'))).toBe(true);
    expect(isRetryableError(new Error('fetch failed'))).toBe(true);
    expect(isRetryableError(new Error('ECONNRESET'))).toBe(true);
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
  });

  it('returns true for server errors and overload', () => {
    expect(isRetryableError(new Error('502 Bad Gateway'))).toBe(true);
    expect(isRetryableError(new Error('Service unavailable'))).toBe(true);
    expect(isRetryableError(new Error('Provider overloaded'))).toBe(true);
  });

  it('returns false for non-retryable errors', () => {
    expect(isRetryableError(new Error('Invalid input'))).toBe(false);
    expect(isRetryableError(new Error('Model reply did not match the expected shape'))).toBe(false);
    expect(isRetryableError(undefined)).toBe(false);
  });

  it('handles errors with a status code', () => {
    expect(isRetryableError(Object.assign(new Error('rate limited'), { status: 429 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('upstream'), { statusCode: 500 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('bad request'), { status: 400 }))).toBe(false);
  });

  it('looks through the cause chain', () => {
    const wrapped = new StepExecutionError('a', 'Step "a" failed', new Error('Rate limit exceeded'));

    expect(isRetryableError(wrapped)).toBe(true);
  });

  it('honors an isRetryable flag from the provider', () => {
    expect(isRetryableError(Object.assign(new Error('provider call failed'), { isRetryable: true }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('provider call failed'), { isRetryable: false }))).toBe(false);
  });

  it('never retries timeouts', () => {
    const cause = new Error('Timed out after 5000ms');
    cause.name = 'TimeoutError';

    expect(isRetryableError(cause)).toBe(false);
    expect(isRetryableError(new StepExecutionError('a', 'Step "a" timed out after 5000ms', cause))).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the result of the first successful call', async () => {
    const fn = vi.fn().mockResolvedValue('success');

    await expect(withRetry(fn, { maxRetries: 3 })).resolves.toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries retryable errors until one succeeds', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('Rate limit'))
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce('success');

    const result = await withRetry(fn, { maxRetries: 3, initialDelayMs: 1, maxDelayMs: 5, onRetry });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map((call) => call[0])).toEqual([1, 2]);
  });

  it('throws non-retryable errors immediately', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('Invalid API key'));

    await expect(withRetry(fn, { maxRetries: 3, initialDelayMs: 1 })).rejects.toThrow('Invalid API key');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error after exhausting retries', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('503 Service Unavailable'));

    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 1 })).rejects.toThrow('503 Service Unavailable');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('honors a custom shouldRetry', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('custom')).mockResolvedValueOnce('ok');

    const result = await withRetry(fn, { initialDelayMs: 1, shouldRetry: (error) => error instanceof Error });

    expect(result).toBe('ok');
  });

  it('keeps delays within the cap', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new Error('overloaded'));

    await expect(withRetry(fn, { maxRetries: 3, initialDelayMs: 2, maxDelayMs: 4, onRetry })).rejects.toThrow();

    for (const [, delayMs] of onRetry.mock.calls) {
      // cap plus 25% jitter
      expect(delayMs).toBeLessThanOrEqual(5);
      expect(delayMs).toBeGreaterThanOrEqual(0);
    }
  });
});

describe('createRetryWrapper', () => {
  it('forwards arguments and retries', async () => {
    const fn = vi
      .fn<(a: number, b: number) => Promise<number>>()
      .mockRejectedValueOnce(new Error('network'))
      .mockImplementation(async (a, b) => a + b);

    const add = createRetryWrapper(fn, { initialDelayMs: 1 });

    await expect(add(2, 3)).resolves.toBe(5);
    expect(fn).toHaveBeenLastCalledWith(2, 3);
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const promise = sleep(1000).then(done);
    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await promise;

    expect(done).toHaveBeenCalledTimes(1);
    vi.useRealTimers();
  });
});
