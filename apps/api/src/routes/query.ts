/**
 * Query Routes
 *
 * - POST /api/query - answer a question from the named collections
 * - POST /api/query/stream - same, as Server-Sent Events
 *
 * @module @docpilot/api/routes/query
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { Query } from '@docpilot/rag';
import { HttpError } from '../errors';
import { createThrottleMiddleware } from '../middleware/throttle';
import type { Services } from '../services';
import { streamAnswer } from '../sse';
import { validate } from '../validation';

// ============================================================================
// Validation Schemas
// ============================================================================

export const questionFields = {
  question: z
    .string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(2000, 'Question exceeds maximum length of 2000 characters'),
  topK: z.number().int().min(1).max(50).optional(),
  minScore: z.number().min(0).max(1).optional(),
  tokenBudget: z.number().int().min(1).optional(),
};

const querySchema = z.object({
  ...questionFields,
  collections: z.array(z.string().min(1)).min(1).optional(),
});

type QueryBody = z.infer<typeof querySchema>;

// ============================================================================
// Routes
// ============================================================================

export function queryRoutes(services: Pick<Services, 'query' | 'collections' | 'coordinator' | 'queryLimiter'>): Hono {
  const query = new Hono();

  query.use('*', createThrottleMiddleware(services.queryLimiter, 'query'));

  const toQuery = (body: QueryBody): Query => {
    const collections = body.collections ?? services.collections;
    const known = new Set(services.coordinator.collections);
    const unknown = collections.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new HttpError(400, 'UNKNOWN_COLLECTION', `Unknown collection(s): ${unknown.join(', ')}`, {
        collections: unknown,
      });
    }

    return {
      question: body.question,
      collections,
      topK: body.topK,
      minScore: body.minScore,
      tokenBudget: body.tokenBudget,
    };
  };

  query.post('/', validate('json', querySchema), async (c) => {
    const startTime = Date.now();
    const answer = await services.query.answer(toQuery(c.req.valid('json')), c.req.raw.signal);

    return c.json({
      status: answer.status,
      answer: answer.text,
      citations: answer.citations,
      latencyMs: Date.now() - startTime,
    });
  });

  query.post('/stream', validate('json', querySchema), async (c) => {
    const startTime = Date.now();
    const answer = await services.query.answerStream(toQuery(c.req.valid('json')), c.req.raw.signal);
    return streamAnswer(c, answer, { startedAt: startTime, label: 'query' });
  });

  return query;
}
