/**
 * Bounded retries and timeouts for adapter calls
 */

import { AdapterError, AdapterTimeoutError, type AdapterOperation, isRetryableAdapterError, toError } from '../errors.js';
import type { OperatorLogger } from '../logging/index.js';
import type { AdapterCallOptions } from '../types/adapters.js';

/**
 * Retry configuration options for operations with exponential backoff
 */
export interface RetryOptions {
  /**
   * Maximum number of attempts, the first one included
   * @default 3
   */
  maxAttempts?: number | undefined;

  /**
   * Delay before the second attempt in milliseconds
   * @default 1000
   */
  baseDelay?: number | undefined;

  /**
   * Maximum delay between attempts in milliseconds
   * @default 10000
   */
  maxDelay?: number | undefined;

  /**
   * @default 2
   */
  backoffFactor?: number | undefined;

  /**
   * Decides whether a failed attempt is worth repeating
   */
  retryableErrors?: ((error: Error) => boolean) | undefined;
}

export const DEFAULT_ADAPTER_TIMEOUT_MS = 30000;

export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const { baseDelay = 1000, maxDelay = 10000, backoffFactor = 2 } = options;
  return Math.min(baseDelay * backoffFactor ** (attempt - 1), maxDelay);
}

/**
 * Sleep that ends early when the signal fires
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

/**
 * Run an operation, retrying retryable failures with exponential backoff.
 * Stops retrying as soon as `signal` fires, rejecting with its reason when
 * that happens during a backoff.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions & { signal?: AbortSignal | undefined; logger?: OperatorLogger | undefined; label?: string } = {}
): Promise<T> {
  const { maxAttempts = 3, retryableErrors = isRetryableAdapterError, signal, logger, label = 'operation' } = options;

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        logger?.debug('Operation succeeded after retry', { label, attempt, maxAttempts });
      }
      return result;
    } catch (error) {
      const lastError = toError(error);
      const retryable = retryableErrors(lastError);

      if (attempt >= maxAttempts || !retryable || signal?.aborted) {
        logger?.warn('Operation failed, giving up', {
          label,
          attempt,
          maxAttempts,
          retryable,
          error: lastError.message,
        });
        throw lastError;
      }

      const delay = backoffDelay(attempt, options);
      logger?.debug('Operation failed, retrying', {
        label,
        error: lastError.message,
        attempt,
        maxAttempts,
        retryDelay: delay,
      });
      await sleep(delay, signal);

      // Never start another attempt for a pass that was superseded during the backoff
      if (signal?.aborted) {
        logger?.debug('Operation abandoned during backoff', { label, attempt, maxAttempts });
        throw signal.reason instanceof Error ? signal.reason : lastError;
      }
    }
  }
}

/**
 * Call an adapter with a bounded timeout. A timeout rejects with
 * AdapterTimeoutError and aborts the call's signal; it never counts as
 * success. Aborting `parent` aborts the call's signal as well.
 */
export async function callWithTimeout<T>(
  operation: AdapterOperation,
  call: (options: AdapterCallOptions) => Promise<T>,
  { timeoutMs, parent }: { timeoutMs: number; parent?: AbortSignal | undefined }
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new AdapterTimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([call({ signal: controller.signal }), timeout]);
  } catch (error) {
    if (error instanceof AdapterError) {
      throw error;
    }
    throw new AdapterError(`${operation} failed: ${toError(error).message}`, operation, true, {
      cause: error,
    });
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
