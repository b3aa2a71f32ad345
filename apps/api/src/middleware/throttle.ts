/**
 * Request Throttling Middleware
 *
 * Holds one limiter slot for the duration of a model-backed request. Overflow
 * queues FIFO; a full queue or a queue timeout surfaces as a `LimiterError`,
 * which the app's error handler turns into 503 or 504.
 *
 * For SSE responses the slot is released when the handler returns the
 * response, not when the stream finishes.
 *
 * @module @docpilot/api/middleware/throttle
 */

import type { ConcurrencyLimiter } from '@docpilot/rag';
import type { MiddlewareHandler } from 'hono';

const SLOW_REQUEST_MS = 10_000;

export function createThrottleMiddleware(limiter: ConcurrencyLimiter, endpointName: string): MiddlewareHandler {
  return async (c, next) => {
    const startTime = Date.now();

    await limiter.acquire(c.req.raw.signal);
    const status = limiter.getStatus();

    try {
      await next();
    } finally {
      limiter.release();

      const duration = Date.now() - startTime;
      if (duration > SLOW_REQUEST_MS) {
        console.info(
          `[${endpointName}] Slow request: ${duration}ms, concurrent: ${status.active}, queued: ${status.queued}`
        );
      }
    }

    c.res.headers.set('X-Throttle-Active', status.active.toString());
    c.res.headers.set('X-Throttle-Queued', status.queued.toString());
  };
}
