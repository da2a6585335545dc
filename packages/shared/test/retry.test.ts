import { describe, expect, it, vi } from 'vitest';

import { RetryExhaustedError, isTransientError, withRetries } from '../src/retry';

describe('withRetries', () => {
  it('returns result on first success', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    const result = await withRetries(fn, { maxRetries: 3, baseDelayMs: 1 });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries on transient error and succeeds', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('fetch failed'))
      .mockResolvedValue('ok');
    const result = await withRetries(fn, { maxRetries: 3, baseDelayMs: 1 });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('throws RetryExhaustedError after all attempts', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('timeout'));
    await expect(withRetries(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('re-throws non-transient errors untouched', async () => {
    const failure = new Error('execution reverted');
    const fn = vi.fn().mockRejectedValue(failure);
    await expect(withRetries(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('caps maxRetries at 5', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('timeout'));
    await expect(withRetries(fn, { maxRetries: 100, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      RetryExhaustedError,
    );
    expect(fn).toHaveBeenCalledTimes(6);
  });

  it('respects abort signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetries(fn, { signal: controller.signal })).rejects.toThrow('Aborted');
    expect(fn).not.toHaveBeenCalled();
  });

  it('supports custom isRetryable predicate', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('custom-retryable'))
      .mockResolvedValue('ok');
    const result = await withRetries(fn, {
      maxRetries: 3,
      baseDelayMs: 1,
      isRetryable: (err) => err instanceof Error && err.message === 'custom-retryable',
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('isTransientError', () => {
  it('matches network-shaped failures only', () => {
    expect(isTransientError(new Error('HTTP 503 Service Unavailable'))).toBe(true);
    expect(isTransientError(new Error('ECONNRESET'))).toBe(true);
    expect(isTransientError(new Error('execution reverted'))).toBe(false);
    expect(isTransientError('timeout')).toBe(false);
  });
});
