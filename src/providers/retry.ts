// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Retry utility for opening completion streams.
 */

import { isAbortError } from '../errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts after the first (default: 2) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 3000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier; 1 keeps the delay fixed (default: 1) */
  backoffMultiplier?: number;
  /** Add random jitter to delays (default: false) */
  jitter?: boolean;
  /** Function to determine if an error is retryable (default: anything but an abort) */
  isRetryable?: (error: Error) => boolean;
  /** Callback when a retry occurs */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Stops waiting between attempts */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'isRetryable' | 'signal'>> = {
  maxRetries: 2,
  initialDelayMs: 3000,
  maxDelayMs: 30000,
  backoffMultiplier: 1,
  jitter: false,
};

/**
 * Default check for retryable errors.
 * A user interrupt is final; every other failure gets another attempt.
 */
export function isRetryableError(error: Error): boolean {
  return !isAbortError(error);
}

/**
 * Calculate delay with optional backoff and jitter.
 */
function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  // initialDelay * multiplier^attempt
  let delay = initialDelayMs * Math.pow(backoffMultiplier, attempt);

  // Cap at max delay
  delay = Math.min(delay, maxDelayMs);

  // Add jitter (0-25% random variation)
  if (jitter) {
    const jitterAmount = delay * 0.25 * Math.random();
    delay += jitterAmount;
  }

  return Math.round(delay);
}

function abortError(): Error {
  const error = new Error('Aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Sleep for a given number of milliseconds, rejecting early on abort.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic.
 *
 * @param fn - The async function to execute, given the 1-based attempt number
 * @returns The result of the function
 * @throws The last error if all retries fail
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = DEFAULT_OPTIONS.maxRetries,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier = DEFAULT_OPTIONS.backoffMultiplier,
    jitter = DEFAULT_OPTIONS.jitter,
    isRetryable = isRetryableError,
    onRetry,
    signal,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      // Check if we should retry
      if (attempt >= maxRetries || !isRetryable(lastError)) {
        throw lastError;
      }

      const delayMs = calculateDelay(
        attempt,
        initialDelayMs,
        maxDelayMs,
        backoffMultiplier,
        jitter
      );

      if (onRetry) {
        onRetry(attempt + 1, lastError, delayMs);
      }

      await sleep(delayMs, signal);
    }
  }

  // Should never reach here, but TypeScript needs this
  throw lastError || new Error('Retry failed');
}
