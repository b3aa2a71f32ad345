/**
 * Supervisor Routes
 *
 * - POST /api/route - classify the question, dispatch to specialists, answer
 * - POST /api/route/stream - same, streamed when an answer is produced
 *
 * A clarification comes back as 200 with `kind: "clarification"` and the
 * candidate specialists; the client answers it by posting the question again
 * with `specialist` set.
 *
 * @module @docpilot/api/routes/route
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { ClarificationOutcome, FailedOutcome, RouteRequest } from '@docpilot/rag';
import { createThrottleMiddleware } from '../middleware/throttle';
import type { Services } from '../services';
import { streamAnswer } from '../sse';
import { validate } from '../validation';
import { questionFields } from './query';

const routeSchema = z.object({
  ...questionFields,
  specialist: z.string().min(1).optional(),
  mode: z.enum(['single', 'multi']).optional(),
});

const clarificationBody = (outcome: ClarificationOutcome) => ({
  kind: outcome.kind,
  reason: outcome.reason,
  message: outcome.message,
  candidates: outcome.candidates,
  history: outcome.history,
});

const failedBody = (outcome: FailedOutcome) => ({
  kind: outcome.kind,
  error: 'ROUTING_FAILED',
  message: outcome.message,
  failures: outcome.failures,
  history: outcome.history,
});

export function routeRoutes(services: Pick<Services, 'router' | 'queryLimiter'>): Hono {
  const route = new Hono();

  route.use('*', createThrottleMiddleware(services.queryLimiter, 'route'));

  route.post('/', validate('json', routeSchema), async (c) => {
    const startTime = Date.now();
    const request: RouteRequest = c.req.valid('json');
    const outcome = await services.router.route(request, { signal: c.req.raw.signal });

    switch (outcome.kind) {
      case 'answer':
        return c.json({
          kind: outcome.kind,
          mode: outcome.mode,
          status: outcome.answer.status,
          answer: outcome.answer.text,
          citations: outcome.answer.citations,
          specialists: outcome.specialists,
          failures: outcome.failures,
          history: outcome.history,
          latencyMs: Date.now() - startTime,
        });
      case 'clarification':
        return c.json(clarificationBody(outcome));
      case 'failed':
        return c.json(failedBody(outcome), 502);
    }
  });

  route.post('/stream', validate('json', routeSchema), async (c) => {
    const startTime = Date.now();
    const request: RouteRequest = c.req.valid('json');
    const outcome = await services.router.routeStream(request, { signal: c.req.raw.signal });

    switch (outcome.kind) {
      case 'stream':
        return streamAnswer(c, outcome.stream, {
          startedAt: startTime,
          label: 'route',
          prelude: [{ type: 'route', specialists: outcome.specialists }],
        });
      case 'clarification':
        return c.json(clarificationBody(outcome));
      case 'failed':
        return c.json(failedBody(outcome), 502);
    }
  });

  return route;
}
