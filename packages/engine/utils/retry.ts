// Retry with exponential backoff for AI calls.

import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/** Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped. */
export function exponentialBackoff(baseMs: number, maxMs: number): (attempt: number) => number {
  return attempt => Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

export interface RetryOptions {
  maxAttempts: number;
  backoff: (attempt: number) => number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: Sleep;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/** Every attempt failed with a retryable error. */
export class RetriesExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError },
    );
    this.name = 'RetriesExhaustedError';
  }
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown (rethrown as is),
 * or `maxAttempts` is reached (RetriesExhaustedError).
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const { maxAttempts, backoff, isRetryable, onRetry, signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (err) {
      if (signal?.aborted || !isRetryable(err)) throw err;
      if (attempt >= maxAttempts) throw new RetriesExhaustedError(attempt, err);
      const wait = backoff(attempt);
      onRetry?.(err, attempt, wait);
      await sleep(wait, signal);
    }
  }
}
