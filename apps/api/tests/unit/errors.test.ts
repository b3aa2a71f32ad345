/**
 * Error Mapping Tests
 *
 * @module @docpilot/api/tests/unit/errors
 */

import { describe, it, expect } from 'vitest';
import { AbortError, TimeoutError } from '@docpilot/database';
import {
  CompletionServiceError,
  EmbeddingServiceError,
  IngestionInProgressError,
  LimiterError,
  UnknownCollectionError,
  VectorStoreError,
} from '@docpilot/rag';
import { TicketTrackerError } from '@docpilot/tickets';
import { HttpError, toErrorResponse } from '../../src/errors';

describe('toErrorResponse', () => {
  it('should keep an HttpError as thrown', () => {
    expect(toErrorResponse(new HttpError(400, 'BAD', 'nope', { field: 'x' }))).toEqual({
      status: 400,
      body: { error: 'BAD', message: 'nope', details: { field: 'x' } },
    });
  });

  it('should map collection errors', () => {
    expect(toErrorResponse(new UnknownCollectionError('wiki')).status).toBe(404);
    expect(toErrorResponse(new IngestionInProgressError('wiki', 'scheduler:1'))).toEqual({
      status: 409,
      body: {
        error: 'INGESTION_IN_PROGRESS',
        message: 'Ingestion for collection "wiki" is already running (scheduler:1)',
      },
    });
  });

  it('should map limiter rejections to 503 and 504', () => {
    expect(toErrorResponse(new LimiterError('full', 'QUEUE_FULL')).status).toBe(503);
    expect(toErrorResponse(new LimiterError('slow', 'QUEUE_TIMEOUT')).status).toBe(504);
  });

  it('should map tracker errors by kind', () => {
    const cases: Array<[TicketTrackerError['kind'], number]> = [
      ['not_found', 404],
      ['access_denied', 502],
      ['rejected', 502],
      ['invalid_response', 502],
      ['transient', 503],
    ];

    for (const [kind, status] of cases) {
      const { status: actual, body } = toErrorResponse(new TicketTrackerError('tracker said no', kind));
      expect(actual).toBe(status);
      expect(body.error).toBe(`TRACKER_${kind.toUpperCase()}`);
    }
  });

  it('should map timeouts and cancellations', () => {
    expect(toErrorResponse(new TimeoutError('Embedding', 30000))).toEqual({
      status: 504,
      body: { error: 'TIMEOUT', message: 'Embedding timed out after 30000ms' },
    });
    expect(toErrorResponse(new AbortError()).body.error).toBe('CANCELLED');
  });

  it('should map upstream failures by retryability', () => {
    expect(toErrorResponse(new CompletionServiceError('rate limited', 'RATE_LIMIT_ERROR', { retryable: true })).status).toBe(503);
    expect(toErrorResponse(new EmbeddingServiceError('bad model', { retryable: false })).status).toBe(502);
    expect(toErrorResponse(new VectorStoreError('milvus down', { unavailable: true }))).toEqual({
      status: 503,
      body: { error: 'UPSTREAM_ERROR', message: 'milvus down' },
    });
  });

  it('should fall back to 500', () => {
    expect(toErrorResponse(new Error('kaboom'))).toEqual({
      status: 500,
      body: { error: 'INTERNAL_SERVER_ERROR', message: 'kaboom' },
    });
  });
});
