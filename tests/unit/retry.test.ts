import { describe, it, expect, vi } from 'vitest';
import { sleep, withRetry, withTimeout } from '../../src/core/retry.js';
import { CancelledError, TimeoutError } from '../../src/core/errors.js';

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('should retry with doubling delays until it succeeds', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('third time');
    const delays: number[] = [];

    const result = await withRetry(fn, {
      maxRetries: 3,
      initialDelayMs: 1,
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
    });

    expect(result).toBe('third time');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1, 2]);
  });

  it('should cap the delay', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('ok');
    const delays: number[] = [];

    await withRetry(fn, {
      maxRetries: 2,
      initialDelayMs: 4,
      maxDelayMs: 5,
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
    });

    expect(delays).toEqual([4, 5]);
  });

  it('should throw the last error once retries are used up', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValue(new Error('last'));

    await expect(withRetry(fn, { maxRetries: 1, initialDelayMs: 0 })).rejects.toThrow('last');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should never retry cancellation', async () => {
    const fn = vi.fn().mockRejectedValue(new CancelledError('stopped'));

    await expect(withRetry(fn, { maxRetries: 5, initialDelayMs: 0 })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should respect isRetryable', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('bad request'));

    await expect(
      withRetry(fn, { maxRetries: 5, initialDelayMs: 0, isRetryable: () => false })
    ).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('should resolve with the operation result', async () => {
    await expect(withTimeout(() => 'fast', { label: 'Work', timeoutMs: 100 })).resolves.toBe(
      'fast'
    );
  });

  it('should reject with TimeoutError and abort the operation signal', async () => {
    let seen: AbortSignal | undefined;
    const promise = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<never>(() => {});
      },
      { label: 'Work', timeoutMs: 10 }
    );

    await expect(promise).rejects.toThrow('Work timed out after 10ms');
    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('should reject at once when the parent signal aborts', async () => {
    const controller = new AbortController();
    const promise = withTimeout(() => new Promise<never>(() => {}), {
      label: 'Work',
      signal: controller.signal,
    });

    controller.abort('user stop');

    await expect(promise).rejects.toThrow('Work cancelled: user stop');
  });

  it('should reject without running when the parent is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn();

    await expect(
      withTimeout(operation, { label: 'Work', signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should wait for the operation when abandonOnAbort is false', async () => {
    const controller = new AbortController();
    const promise = withTimeout(
      (signal) =>
        new Promise<string>((resolve) => {
          signal.addEventListener('abort', () => resolve('cleaned up'));
        }),
      { label: 'Work', signal: controller.signal, abandonOnAbort: false }
    );

    controller.abort();

    await expect(promise).resolves.toBe('cleaned up');
  });
});

describe('sleep', () => {
  it('should reject when the signal aborts', async () => {
    const controller = new AbortController();
    const promise = sleep(10_000, controller.signal);

    controller.abort(new Error('shutdown'));

    await expect(promise).rejects.toThrow('Wait cancelled: shutdown');
  });
});
