import { Logger } from '@nestjs/common';
import { FetchError, describeError } from './errors';
import { sleep } from './helper';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
};

export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FetchError };

export interface RetryOptions {
  logger?: Pick<Logger, 'warn' | 'error'>;
  /** Aborting interrupts a pending backoff wait and stops further attempts. */
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultLogger = new Logger('Retry');

/**
 * Run a read operation with bounded retry and exponential backoff.
 * Only meant for idempotent reads: order submission must not go through here.
 */
export async function withRetry<T>(
  operationName: string,
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {},
): Promise<FetchResult<T>> {
  const logger = options.logger ?? defaultLogger;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  let delay = policy.initialDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { ok: false, error: new FetchError('CANCELLED', operationName, attempt - 1, lastError) };
    }

    try {
      const value = await operation();
      return { ok: true, value };
    } catch (error) {
      lastError = error;
      logger.warn(
        `⚠️ Error in ${operationName}: ${describeError(error)} (attempt ${attempt}/${maxAttempts})`,
      );
    }

    if (attempt < maxAttempts) {
      await wait(delay, options.signal);
      delay *= policy.backoffFactor;
    }
  }

  logger.error(`❌ ${operationName} failed after ${maxAttempts} attempts`);
  return { ok: false, error: new FetchError('EXHAUSTED', operationName, maxAttempts, lastError) };
}
