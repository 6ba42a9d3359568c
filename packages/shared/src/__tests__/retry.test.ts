import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, retry } from '../retry.js';

describe('backoffDelay', () => {
  it('keeps a fixed delay', () => {
    expect(backoffDelay({ maxAttempts: 3, delayMs: 100, backoff: 'fixed' }, 3)).toBe(100);
  });

  it('doubles an exponential delay up to the cap', () => {
    const policy = { maxAttempts: 10, delayMs: 100, maxDelayMs: 500 };
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(policy, attempt))).toEqual([100, 200, 400, 500]);
  });
});

describe('retry', () => {
  it('returns the first success', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('one'))
      .mockResolvedValueOnce('two');
    const onRetry = vi.fn();

    await expect(retry(fn, { maxAttempts: 3, delayMs: 0, onRetry })).resolves.toBe('two');
    expect(fn.mock.calls).toEqual([[1], [2]]);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('always'));
    await expect(retry(fn, { maxAttempts: 2, delayMs: 0 })).rejects.toThrow('always');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops when shouldRetry says no', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('fatal'));
    await expect(retry(fn, { maxAttempts: 5, delayMs: 0, shouldRetry: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops once the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort();
      throw new Error('cancelled');
    });
    await expect(retry(fn, { maxAttempts: 5, delayMs: 0, signal: controller.signal })).rejects.toThrow('cancelled');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
