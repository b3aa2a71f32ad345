/**
 * Concurrency Limiter
 *
 * FIFO slot queue with an optional minimum interval between starts. Used to
 * keep embedding calls within the service's throughput and to throttle the
 * LLM-backed HTTP routes. Waiters park on a promise; nothing polls.
 *
 * @module @docpilot/rag/concurrency/limiter
 */

import { AbortError, sleep } from '@docpilot/database';

// ============================================================================
// Configuration
// ============================================================================

export interface LimiterConfig {
  /** Maximum operations holding a slot at once */
  maxConcurrent: number;
  /** Maximum waiters; further acquires are rejected */
  maxQueueSize: number;
  /** How long a waiter may queue before it is rejected (0 = no limit) */
  queueTimeoutMs: number;
  /** Minimum spacing between two slot grants */
  minIntervalMs: number;
}

const DEFAULT_CONFIG: LimiterConfig = {
  maxConcurrent: 4,
  maxQueueSize: Number.POSITIVE_INFINITY,
  queueTimeoutMs: 0,
  minIntervalMs: 0,
};

export interface LimiterStatus {
  active: number;
  queued: number;
  available: number;
}

export type LimiterErrorType = 'QUEUE_FULL' | 'QUEUE_TIMEOUT';

export class LimiterError extends Error {
  public readonly errorType: LimiterErrorType;
  public readonly retryable = true;

  constructor(message: string, errorType: LimiterErrorType) {
    super(message);
    this.name = 'LimiterError';
    this.errorType = errorType;
  }
}

interface Waiter {
  grant: () => void;
}

// ============================================================================
// Limiter
// ============================================================================

export class ConcurrencyLimiter {
  private config: LimiterConfig;
  private activeCount = 0;
  private queue: Waiter[] = [];
  private nextStartAt = 0;

  constructor(config: Partial<LimiterConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.maxConcurrent < 1) {
      throw new Error('maxConcurrent must be at least 1');
    }
  }

  /**
   * Wait for a slot. Resolves once the slot is held and the start interval has
   * passed; the caller must `release()` afterwards.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortError();
    }

    if (this.activeCount < this.config.maxConcurrent && this.queue.length === 0) {
      this.activeCount++;
    } else {
      await this.enqueue(signal);
    }

    try {
      await this.spaceStart(signal);
    } catch (error) {
      this.release();
      throw error;
    }
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // slot passes straight to the next waiter
      next.grant();
      return;
    }
    this.activeCount = Math.max(0, this.activeCount - 1);
  }

  /**
   * Run `operation` inside a slot
   */
  async run<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  getStatus(): LimiterStatus {
    return {
      active: this.activeCount,
      queued: this.queue.length,
      available: Math.max(0, this.config.maxConcurrent - this.activeCount),
    };
  }

  private enqueue(signal?: AbortSignal): Promise<void> {
    if (this.queue.length >= this.config.maxQueueSize) {
      return Promise.reject(
        new LimiterError('Service is temporarily overloaded. Please try again later.', 'QUEUE_FULL')
      );
    }

    return new Promise<void>((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const cleanup = () => {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
      };
      const leave = (error: Error) => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) {
          this.queue.splice(index, 1);
          cleanup();
          reject(error);
        }
      };
      const onAbort = () => leave(new AbortError());

      const waiter: Waiter = {
        grant: () => {
          cleanup();
          resolve();
        },
      };

      if (this.config.queueTimeoutMs > 0) {
        timeoutId = setTimeout(
          () =>
            leave(
              new LimiterError('Request timed out waiting in queue. Please try again.', 'QUEUE_TIMEOUT')
            ),
          this.config.queueTimeoutMs
        );
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private async spaceStart(signal?: AbortSignal): Promise<void> {
    if (this.config.minIntervalMs <= 0) return;

    const now = Date.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.config.minIntervalMs;

    if (startAt > now) {
      await sleep(startAt - now, signal);
    }
  }
}
