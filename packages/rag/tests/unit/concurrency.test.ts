/**
 * Concurrency Primitive Tests
 *
 * @module @docpilot/rag/tests/unit/concurrency
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { AbortError } from '@docpilot/database';
import { ConcurrencyLimiter, LimiterError } from '../../src/concurrency/limiter';
import { CollectionLockRegistry } from '../../src/concurrency/locks';
import { KeyedMutex } from '../../src/concurrency/mutex';
import { runWithConcurrency } from '../../src/concurrency/pool';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

// ============================================================================
// ConcurrencyLimiter
// ============================================================================

describe('ConcurrencyLimiter', () => {
  it('should reject a maxConcurrent below one', () => {
    expect(() => new ConcurrencyLimiter({ maxConcurrent: 0 })).toThrow('maxConcurrent must be at least 1');
  });

  it('should hold callers beyond the limit until a slot frees up', async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1 });
    const gate = deferred();
    const order: string[] = [];

    const first = limiter.run(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = limiter.run(async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(limiter.getStatus()).toEqual({ active: 1, queued: 1, available: 0 });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(limiter.getStatus()).toEqual({ active: 0, queued: 0, available: 1 });
  });

  it('should serve waiters in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1 });
    await limiter.acquire();
    const order: number[] = [];

    const waiters = [1, 2, 3].map((n) => limiter.acquire().then(() => order.push(n)));
    limiter.release();
    await waiters[0];
    limiter.release();
    await waiters[1];
    limiter.release();
    await waiters[2];

    expect(order).toEqual([1, 2, 3]);
  });

  it('should reject when the queue is full', async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1, maxQueueSize: 0 });
    await limiter.acquire();

    const error = await limiter.acquire().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LimiterError);
    expect(error instanceof LimiterError && error.errorType).toBe('QUEUE_FULL');
  });

  it('should reject a waiter that queued too long', async () => {
    vi.useFakeTimers();
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1, queueTimeoutMs: 100 });
    await limiter.acquire();

    const waiting = limiter.acquire().catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(100);

    const error = await waiting;
    expect(error instanceof LimiterError && error.errorType).toBe('QUEUE_TIMEOUT');
    expect(limiter.getStatus().queued).toBe(0);
  });

  it('should drop an aborted waiter from the queue', async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1 });
    await limiter.acquire();
    const controller = new AbortController();

    const waiting = limiter.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AbortError);
    expect(limiter.getStatus().queued).toBe(0);
  });

  it('should space slot grants by minIntervalMs', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 2, minIntervalMs: 50 });
    const starts: number[] = [];

    await limiter.run(async () => void starts.push(Date.now()));
    const second = limiter.run(async () => void starts.push(Date.now()));
    await vi.advanceTimersByTimeAsync(50);
    await second;

    expect(starts).toEqual([0, 50]);
  });
});

// ============================================================================
// KeyedMutex
// ============================================================================

describe('KeyedMutex', () => {
  it('should serialize operations with the same key', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive('doc', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('doc', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(mutex.isLocked('doc')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('doc')).toBe(false);
  });

  it('should let different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive('a', async () => {
      await gate.promise;
      order.push('a');
    });
    const second = mutex.runExclusive('b', async () => {
      order.push('b');
    });

    await second;
    gate.resolve();
    await first;

    expect(order).toEqual(['b', 'a']);
  });

  it('should keep the queue moving after a failure', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('doc', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('doc', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});

// ============================================================================
// CollectionLockRegistry
// ============================================================================

describe('CollectionLockRegistry', () => {
  it('should grant one lease per collection', () => {
    const locks = new CollectionLockRegistry({ now: () => 1000 });

    const lease = locks.tryAcquire('handbook', 'api:1');

    expect(lease).toMatchObject({ collection: 'handbook', owner: 'api:1' });
    expect(locks.tryAcquire('handbook', 'scheduler:2')).toBeNull();
    expect(locks.tryAcquire('runbooks', 'scheduler:2')).not.toBeNull();
    expect(locks.list().map((l) => l.collection)).toEqual(['handbook', 'runbooks']);
  });

  it('should free the collection on release', () => {
    const locks = new CollectionLockRegistry();
    const lease = locks.tryAcquire('handbook', 'api:1');

    expect(lease && locks.release(lease)).toBe(true);
    expect(locks.isLocked('handbook')).toBe(false);
  });

  it('should expire a lease after its TTL and ignore the stale release', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    let now = 0;
    const locks = new CollectionLockRegistry({ ttlMs: 100, now: () => now });
    const stale = locks.tryAcquire('handbook', 'api:1');

    now = 100;
    const fresh = locks.tryAcquire('handbook', 'scheduler:2');

    expect(fresh?.owner).toBe('scheduler:2');
    expect(stale && locks.release(stale)).toBe(false);
    expect(locks.holder('handbook')?.owner).toBe('scheduler:2');
  });
});

// ============================================================================
// runWithConcurrency
// ============================================================================

describe('runWithConcurrency', () => {
  it('should never run more than the limit at once', async () => {
    let running = 0;
    let peak = 0;

    const result = await runWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 1));
      running--;
    });

    expect(peak).toBe(2);
    expect(result).toEqual({ started: 5, interrupted: false });
  });

  it('should stop dispatching once the signal aborts', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const result = await runWithConcurrency(
      [1, 2, 3, 4],
      1,
      async (item) => {
        seen.push(item);
        if (item === 2) controller.abort();
      },
      { signal: controller.signal }
    );

    expect(seen).toEqual([1, 2]);
    expect(result).toEqual({ started: 2, interrupted: true });
  });

  it('should stop dispatching when shouldStop returns true', async () => {
    const seen: number[] = [];

    const result = await runWithConcurrency([1, 2, 3], 1, async (item) => void seen.push(item), {
      shouldStop: () => seen.length >= 1,
    });

    expect(seen).toEqual([1]);
    expect(result.interrupted).toBe(true);
  });

  it('should handle an empty list', async () => {
    await expect(runWithConcurrency([], 4, async () => {})).resolves.toEqual({ started: 0, interrupted: false });
  });
});
