// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi } from 'vitest';
import { isRetryableError, withRetry } from '../src/providers/retry.js';

function abortError(): Error {
  const error = new Error('aborted');
  error.name = 'AbortError';
  return error;
}

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');
    await expect(withRetry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('retries until the call succeeds', async () => {
    let calls = 0;
    const onRetry = vi.fn();
    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return 'done';
      },
      { maxRetries: 2, initialDelayMs: 0, onRetry }
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[1][1]).toEqual(new Error('fail 2'));
  });

  it('throws the last error when every attempt fails', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`fail ${calls}`);
        },
        { maxRetries: 2, initialDelayMs: 0 }
      )
    ).rejects.toThrow('fail 3');
    expect(calls).toBe(3);
  });

  it('keeps a fixed delay by default', async () => {
    const delays: number[] = [];
    await withRetry(
      async (attempt) => {
        if (attempt < 3) throw new Error('flaky');
        return attempt;
      },
      { initialDelayMs: 5, onRetry: (_attempt, _error, delayMs) => delays.push(delayMs) }
    );
    expect(delays).toEqual([5, 5]);
  });

  it('backs off when a multiplier is given', async () => {
    const delays: number[] = [];
    await withRetry(
      async (attempt) => {
        if (attempt < 3) throw new Error('flaky');
        return attempt;
      },
      { initialDelayMs: 5, backoffMultiplier: 2, onRetry: (_attempt, _error, delayMs) => delays.push(delayMs) }
    );
    expect(delays).toEqual([5, 10]);
  });

  it('does not retry an abort', async () => {
    const fn = vi.fn(async () => {
      throw abortError();
    });
    await expect(withRetry(fn, { initialDelayMs: 0 })).rejects.toThrow('aborted');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops waiting when the signal fires', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      throw new Error('down');
    });

    const error = await withRetry(fn, {
      initialDelayMs: 60000,
      signal: controller.signal,
      onRetry: () => controller.abort(),
    }).catch((e: unknown) => e);

    expect(error instanceof Error && error.name).toBe('AbortError');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error throws', async () => {
    await expect(
      withRetry(
        async () => {
          throw 'plain string';
        },
        { maxRetries: 0 }
      )
    ).rejects.toThrow('plain string');
  });
});

describe('isRetryableError', () => {
  it('retries everything except aborts', () => {
    expect(isRetryableError(new Error('ECONNRESET'))).toBe(true);
    expect(isRetryableError(abortError())).toBe(false);
  });
});
