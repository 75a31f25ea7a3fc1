import { describe, expect, it, vi } from 'vitest';
import { AdapterError, AdapterTimeoutError } from '../../../src/core/errors.js';
import { backoffDelay, callWithTimeout, sleep, withRetry } from '../../../src/core/reconciler/retry.js';

function transient(message = 'connection reset'): AdapterError {
  return new AdapterError(message, 'fetchWorkload', true);
}

describe('Retry', () => {
  describe('backoffDelay', () => {
    it('should grow exponentially up to the maximum', () => {
      expect(backoffDelay(1)).toBe(1000);
      expect(backoffDelay(2)).toBe(2000);
      expect(backoffDelay(3)).toBe(4000);
      expect(backoffDelay(5)).toBe(10000);
      expect(backoffDelay(3, { baseDelay: 10, backoffFactor: 3 })).toBe(90);
    });
  });

  describe('withRetry', () => {
    it('should retry retryable failures until the operation succeeds', async () => {
      const operation = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(transient())
        .mockRejectedValueOnce(transient())
        .mockResolvedValueOnce('ok');

      await expect(withRetry(operation, { maxAttempts: 3, baseDelay: 1 })).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    });

    it('should fail immediately on a non-retryable error', async () => {
      const failure = new AdapterError('forbidden', 'setEnv', false);
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

      await expect(withRetry(operation, { maxAttempts: 5, baseDelay: 1 })).rejects.toBe(failure);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should give up after the maximum number of attempts', async () => {
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(transient('still down'));

      await expect(withRetry(operation, { maxAttempts: 2, baseDelay: 1 })).rejects.toThrow('still down');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should stop retrying once the signal fired', async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn<() => Promise<string>>().mockRejectedValue(transient());

      await expect(withRetry(operation, { maxAttempts: 3, baseDelay: 1, signal: controller.signal })).rejects.toThrow(
        'connection reset'
      );
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should not attempt again when the signal fires during the backoff', async () => {
      const controller = new AbortController();
      const superseded = new Error('superseded by a newer pass');
      const operation = vi.fn<() => Promise<string>>().mockImplementation(async () => {
        setTimeout(() => controller.abort(superseded), 5);
        throw transient();
      });

      await expect(withRetry(operation, { maxAttempts: 3, baseDelay: 60000, signal: controller.signal })).rejects.toBe(
        superseded
      );
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('sleep', () => {
    it('should end early when the signal fires', async () => {
      const controller = new AbortController();
      const started = Date.now();
      const sleeping = sleep(60000, controller.signal);
      controller.abort();
      await sleeping;
      expect(Date.now() - started).toBeLessThan(1000);
    });
  });

  describe('callWithTimeout', () => {
    it('should return the result of a call that finishes in time', async () => {
      await expect(callWithTimeout('fetchWorkload', async () => 'env', { timeoutMs: 1000 })).resolves.toBe('env');
    });

    it('should reject with AdapterTimeoutError and abort the call when time runs out', async () => {
      let seen: AbortSignal | undefined;
      const call = ({ signal }: { signal: AbortSignal }): Promise<string> => {
        seen = signal;
        return new Promise<string>(() => undefined);
      };

      const result = callWithTimeout('fetchRoutingRule', call, { timeoutMs: 20 });

      await expect(result).rejects.toBeInstanceOf(AdapterTimeoutError);
      await expect(result).rejects.toThrow('fetchRoutingRule timed out after 20ms');
      expect(seen?.aborted).toBe(true);
      expect(seen?.reason).toBeInstanceOf(AdapterTimeoutError);
    });

    it('should count a timeout as retryable', async () => {
      const result = callWithTimeout('setEnv', () => new Promise<void>(() => undefined), { timeoutMs: 5 });
      await expect(result).rejects.toMatchObject({ retryable: true, operation: 'setEnv', timeoutMs: 5 });
    });

    it('should wrap plain errors as retryable adapter errors', async () => {
      const result = callWithTimeout(
        'setEnv',
        async () => {
          throw new Error('boom');
        },
        { timeoutMs: 1000 }
      );

      await expect(result).rejects.toBeInstanceOf(AdapterError);
      await expect(result).rejects.toMatchObject({ message: 'setEnv failed: boom', retryable: true, operation: 'setEnv' });
    });

    it('should pass adapter errors through unchanged', async () => {
      const failure = new AdapterError('forbidden', 'setRoutingRule', false);
      await expect(
        callWithTimeout(
          'setRoutingRule',
          async () => {
            throw failure;
          },
          { timeoutMs: 1000 }
        )
      ).rejects.toBe(failure);
    });

    it('should abort the call when the parent signal fires', async () => {
      const parent = new AbortController();
      let seen: AbortSignal | undefined;
      const running = callWithTimeout(
        'setEnv',
        ({ signal }) => {
          seen = signal;
          return new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve()));
        },
        { timeoutMs: 1000, parent: parent.signal }
      );

      parent.abort('preempted');
      await running;
      expect(seen?.aborted).toBe(true);
      expect(seen?.reason).toBe('preempted');
    });
  });
});
