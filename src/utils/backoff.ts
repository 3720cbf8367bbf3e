import { setTimeout as sleep } from 'timers/promises';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';

export interface RetryPolicy {
  maxAttempts: number;
  baseBackoffMs: number;
}

export const defaultRetryPolicy = (): RetryPolicy => ({
  maxAttempts: config.redemption.maxAttempts,
  baseBackoffMs: config.redemption.baseBackoffMs,
});

/**
 * Delay before the given attempt (1-based). After failed attempt k the caller
 * waits baseMs * 2^(k - 1); the first attempt never waits.
 */
export const backoffDelay = (attempt: number, baseMs: number): number =>
  attempt <= 1 ? 0 : baseMs * 2 ** (attempt - 2);

/**
 * Throw OPERATION_ABORTED if the caller has given up on the request
 */
export const ensureNotAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw ApiError.aborted(
      signal.reason instanceof Error ? `operation aborted: ${signal.reason.message}` : undefined
    );
  }
};

/**
 * Wait for `ms`, waking early with OPERATION_ABORTED when the signal fires
 */
export const waitFor = async (ms: number, signal?: AbortSignal): Promise<void> => {
  ensureNotAborted(signal);
  if (ms <= 0) {
    return;
  }
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw ApiError.aborted();
    }
    throw error;
  }
};
