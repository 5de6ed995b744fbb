import { Logger } from '@nestjs/common';
import { TransientIoError, errorMessage } from './errors';

export type BackoffStrategy = 'fixed' | 'linear';

export interface RetryPolicy {
  /** Total attempts, including the first one */
  attempts: number;
  /** Base delay between attempts (ms) */
  delayMs: number;
  /** fixed: always delayMs; linear: delayMs × attempt number */
  backoff: BackoffStrategy;
}

export interface RetryOptions {
  logger: Logger;
  /** Describes the operation in log lines, e.g. "raw write 2024-03-01" */
  label: string;
  /** Errors for which this returns false are rethrown immediately */
  isRetryable?: (err: unknown) => boolean;
}

export const isTransient = (err: unknown): boolean => err instanceof TransientIoError;

export function retryDelay(policy: RetryPolicy, attempt: number): number {
  return policy.backoff === 'linear' ? policy.delayMs * attempt : policy.delayMs;
}

const sleep = (ms: number) =>
  ms > 0 ? new Promise<void>((resolve) => setTimeout(resolve, ms)) : Promise.resolve();

/**
 * Runs `operation` until it succeeds or `policy.attempts` is exhausted.
 * Only transient errors are retried unless `isRetryable` says otherwise;
 * the last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  { logger, label, isRetryable = isTransient }: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!isRetryable(err)) throw err;

      if (attempt >= attempts) {
        logger.error(`${label} failed after ${attempts} attempt(s): ${errorMessage(err)}`);
        throw err;
      }

      const delay = retryDelay(policy, attempt);
      logger.warn(
        `${label} failed (attempt ${attempt}/${attempts}), retrying in ${delay}ms: ${errorMessage(err)}`,
      );
      await sleep(delay);
    }
  }
}
