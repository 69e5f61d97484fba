/**
 * Bounded retry with exponential backoff for object-store calls.
 *
 * Only StorageErrors marked transient are retried. Anything else fails on
 * the first attempt.
 */

import type { Logger } from 'pino';
import { StorageError, SyncAbortedError } from '../errors.js';

export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on each further attempt (default: 200) */
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
};

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Exponential delay with up to one base delay of jitter. */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = random() * baseDelayMs;
  return exponentialDelay + jitter;
}

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: Sleep;
  logger: Logger;
  /** Object key, for error messages and logs */
  key: string;
  /** Operation name, for logs */
  operation: string;
  signal?: AbortSignal;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

function asStorageError(err: unknown, key: string): StorageError {
  if (err instanceof StorageError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(message, { transient: false, key, cause: err });
}

/**
 * Run an operation, retrying transient StorageErrors.
 *
 * @throws StorageError carrying the number of attempts made
 * @throws SyncAbortedError if the signal fires between attempts
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const { policy, sleep, logger, key, signal } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new SyncAbortedError();
    }

    try {
      const value = await operation();
      return { value, attempts: attempt };
    } catch (err) {
      const storageError = asStorageError(err, key);

      if (!storageError.transient || attempt >= policy.maxAttempts) {
        throw storageError.withAttempts(attempt);
      }

      const delay = backoffDelay(attempt, policy.baseDelayMs);
      logger.warn(
        { key, operation: options.operation, attempt, delayMs: Math.round(delay), error: storageError.message },
        'Transient storage failure, retrying'
      );
      await sleep(delay);
    }
  }
}
