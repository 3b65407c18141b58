/**
 * Tests for retry helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry, withTimeout } from './retry.js';

const noSleep = vi.fn(async (_ms: number): Promise<void> => undefined);

class TransientError extends Error {}

const transientOnly = (error: Error): boolean => error instanceof TransientError;

describe('backoffDelay', () => {
  it('should grow exponentially and cap at the maximum', () => {
    expect(backoffDelay(0, 1000, 120000)).toBe(1000);
    expect(backoffDelay(3, 1000, 120000)).toBe(8000);
    expect(backoffDelay(10, 1000, 120000)).toBe(120000);
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');
    await expect(withRetry(fn, { sleep: noSleep, isRetryable: transientOnly })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry transient errors and report each retry', async () => {
    noSleep.mockClear();
    const onRetry = vi.fn();
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('fetch failed'))
      .mockResolvedValueOnce('ok');

    const result = await withRetry(fn, { sleep: noSleep, onRetry, initialDelayMs: 50, isRetryable: transientOnly });

    expect(result).toBe('ok');
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), 50);
    expect(noSleep).toHaveBeenCalledWith(50);
  });

  it('should not retry errors the predicate rejects', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new Error('invalid request');
    });

    await expect(withRetry(fn, { sleep: noSleep, isRetryable: transientOnly })).rejects.toThrow('invalid request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error once retries are exhausted', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new TransientError('503 unavailable');
    });

    await expect(withRetry(fn, { sleep: noSleep, maxRetries: 2, isRetryable: transientOnly })).rejects.toThrow(
      '503 unavailable'
    );
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should wrap non-Error rejections before testing them', async () => {
    const isRetryable = vi.fn((_error: Error) => false);
    const fn = vi.fn(async (): Promise<string> => {
      throw 'plain string';
    });

    await expect(withRetry(fn, { sleep: noSleep, isRetryable })).rejects.toThrow('plain string');
    expect(isRetryable.mock.calls[0][0]).toBeInstanceOf(Error);
  });

  it('should let delayForError replace the computed delay', async () => {
    noSleep.mockClear();
    const fn = vi.fn<() => Promise<number>>()
      .mockRejectedValueOnce(new TransientError('429'))
      .mockResolvedValueOnce(1);

    await withRetry(fn, { sleep: noSleep, isRetryable: transientOnly, delayForError: () => 4321 });

    expect(noSleep).toHaveBeenCalledWith(4321);
  });
});

describe('withTimeout', () => {
  it('should resolve when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'work')).resolves.toBe(7);
  });

  it('should reject with a labelled error on timeout', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 500, 'wikipedia');
    const assertion = expect(pending).rejects.toThrow('wikipedia timed out after 500ms');
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    vi.useRealTimers();
  });
});
