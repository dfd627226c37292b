import { describe, it, expect, vi } from 'vitest';
import { RetriesExhaustedError, exponentialBackoff, withRetry } from '../utils/retry.js';

class Transient extends Error {}
class Fatal extends Error {}

const options = {
  maxAttempts: 3,
  backoff: exponentialBackoff(10, 100),
  isRetryable: (err: unknown) => !(err instanceof Fatal),
};

describe('exponentialBackoff', () => {
  it('doubles from the base and caps at the maximum', () => {
    const backoff = exponentialBackoff(1000, 5000);
    expect([1, 2, 3, 4, 5].map(backoff)).toEqual([1000, 2000, 4000, 5000, 5000]);
  });
});

describe('withRetry', () => {
  it('retries transient failures with backoff', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Transient('t1'))
      .mockRejectedValueOnce(new Transient('t2'))
      .mockResolvedValueOnce('ok');

    const outcome = await withRetry(fn, { ...options, sleep, onRetry });

    expect(outcome).toEqual({ value: 'ok', attempts: 3 });
    expect(fn.mock.calls.map(c => c[0])).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(c => c[0])).toEqual([10, 20]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('gives up after the attempt limit', async () => {
    const fn = vi.fn().mockRejectedValue(new Transient('down'));
    const error = await withRetry(fn, { ...options, sleep: async () => {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(error).toMatchObject({ attempts: 3, message: 'Gave up after 3 attempt(s): down' });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows non-retryable errors without retrying', async () => {
    const fn = vi.fn().mockRejectedValue(new Fatal('denied'));
    await expect(withRetry(fn, { ...options, sleep: async () => {} })).rejects.toBeInstanceOf(Fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort(new Error('cancelled'));
      throw new Transient('t');
    });
    await expect(withRetry(fn, { ...options, signal: controller.signal, sleep: async () => {} }))
      .rejects.toBeInstanceOf(Transient);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('validates the attempt limit', async () => {
    await expect(withRetry(async () => 1, { ...options, maxAttempts: 0 })).rejects.toThrow(RangeError);
  });
});
