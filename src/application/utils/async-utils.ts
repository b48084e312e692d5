/**
 * Shared Async Utilities
 * Timeouts and retries for the cluster transport, bounded fan-out for
 * namespace units
 */

import type { Logger } from 'pino';
import { AuditCancelledError, TimeoutError, toError } from '../../lib/errors';

export interface TimeoutOptions {
  timeout: number;
  errorMessage?: string;
}

/**
 * Execute a promise with timeout
 */
export async function withTimeout<T>(
  promise: Promise<T> | (() => Promise<T>),
  options: TimeoutOptions | number,
): Promise<T> {
  const { timeout, errorMessage } = typeof options === 'number' ? { timeout: options } : options;
  const message = errorMessage ?? `Operation timed out after ${timeout}ms`;

  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(message, timeout)), timeout);
  });

  try {
    const promiseToRun = typeof promise === 'function' ? promise() : promise;
    return await Promise.race([promiseToRun, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Resolves after `ms`, or as soon as the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  maxAttempts: number;
  backoff?: 'linear' | 'exponential' | 'none';
  initialDelay?: number;
  maxDelay?: number;
  retryIf?: (error: Error) => boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Execute an operation with retry logic
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxAttempts,
    backoff = 'exponential',
    initialDelay = 500,
    maxDelay = 10000,
    retryIf,
    signal,
    logger,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new AuditCancelledError();
    }

    try {
      return await operation();
    } catch (error) {
      lastError = toError(error);

      if (retryIf && !retryIf(lastError)) {
        throw lastError;
      }

      if (attempt >= maxAttempts) {
        break;
      }

      let delay = 0;
      if (backoff === 'exponential') {
        delay = Math.min(initialDelay * Math.pow(2, attempt - 1), maxDelay);
      } else if (backoff === 'linear') {
        delay = Math.min(initialDelay * attempt, maxDelay);
      }

      logger?.warn(
        {
          attempt,
          maxAttempts,
          delay,
          error: lastError.message,
        },
        `Retrying operation (attempt ${attempt}/${maxAttempts})`,
      );

      await sleep(delay, signal);
    }
  }

  throw lastError ?? new Error('Operation failed after retries');
}

/**
 * Run operations with a concurrency limit. Results keep input order. Once the
 * signal fires no new item is started and the call rejects after in-flight
 * items settle.
 */
export async function parallelLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () =>
    worker(),
  );
  await Promise.all(workers);

  if (signal?.aborted) {
    throw new AuditCancelledError({ started: next, total: items.length });
  }
  return results;
}
