import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  withRetry,
  withTimeout,
  isRetryableError,
  AbortError,
  TimeoutError,
} from '../../src/retry/index';

const noSleep = () => Promise.resolve();

describe('withRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the first successful result', async () => {
    const operation = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(operation, { sleep: noSleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry until the operation succeeds', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');

    await expect(withRetry(operation, { sleep: noSleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation).toHaveBeenLastCalledWith(3);
  });

  it('should give up after maxRetries and rethrow the last error', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('still down'));
    await expect(withRetry(operation, { maxRetries: 2, sleep: noSleep })).rejects.toThrow(
      'still down'
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should not retry errors rejected by shouldRetry', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('bad request'));
    await expect(
      withRetry(operation, { shouldRetry: () => false, sleep: noSleep })
    ).rejects.toThrow('bad request');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should grow the delay exponentially up to maxDelayMs', async () => {
    const delays: number[] = [];
    const operation = vi.fn().mockRejectedValue(new Error('down'));

    await expect(
      withRetry(operation, {
        maxRetries: 4,
        initialDelayMs: 100,
        maxDelayMs: 300,
        factor: 2,
        sleep: noSleep,
        onRetry: ({ delayMs }) => delays.push(delayMs),
      })
    ).rejects.toThrow('down');

    expect(delays).toEqual([100, 200, 300, 300]);
  });

  it('should stop before the next attempt once the signal is aborted', async () => {
    const controller = new AbortController();
    const operation = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error('down');
    });

    await expect(
      withRetry(operation, { signal: controller.signal, sleep: noSleep })
    ).rejects.toBeInstanceOf(AbortError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('should resolve when the operation finishes in time', async () => {
    await expect(withTimeout(async () => 42, 1000, 'fast call')).resolves.toBe(42);
  });

  it('should reject with TimeoutError and abort the operation signal', async () => {
    let received: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        received = signal;
        return new Promise<never>(() => {});
      },
      10,
      'slow call'
    );

    await expect(pending).rejects.toThrow('slow call timed out after 10ms');
    expect(received?.aborted).toBe(true);
  });

  it('should refuse to start when the parent signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn();

    await expect(withTimeout(operation, 1000, 'call', controller.signal)).rejects.toBeInstanceOf(
      AbortError
    );
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('isRetryableError', () => {
  it('should treat timeouts and retryable-flagged errors as retryable', () => {
    expect(isRetryableError(new TimeoutError('call', 5))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('x'), { retryable: true }))).toBe(true);
  });

  it('should treat plain errors and non-errors as permanent', () => {
    expect(isRetryableError(new Error('x'))).toBe(false);
    expect(isRetryableError('x')).toBe(false);
    expect(isRetryableError(null)).toBe(false);
  });
});
