/**
 * Maps domain errors onto HTTP responses. Routes throw; the app's error
 * handler renders the result.
 *
 * @module @docpilot/api/errors
 */

import { AbortError, TimeoutError } from '@docpilot/database';
import {
  CompletionServiceError,
  EmbeddingServiceError,
  IngestionInProgressError,
  LimiterError,
  UnknownCollectionError,
  VectorStoreError,
  type ErrorResponse,
} from '@docpilot/rag';
import { TicketTrackerError } from '@docpilot/tickets';

export type ErrorStatus = 400 | 404 | 409 | 500 | 502 | 503 | 504;

export class HttpError extends Error {
  constructor(
    public readonly status: ErrorStatus,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const TRACKER_STATUS: Record<TicketTrackerError['kind'], ErrorStatus> = {
  not_found: 404,
  access_denied: 502,
  rejected: 502,
  invalid_response: 502,
  transient: 503,
};

export function toErrorResponse(error: unknown): { status: ErrorStatus; body: ErrorResponse } {
  const respond = (status: ErrorStatus, code: string, message: string, details?: Record<string, unknown>) => ({
    status,
    body: details ? { error: code, message, details } : { error: code, message },
  });

  if (error instanceof HttpError) return respond(error.status, error.code, error.message, error.details);
  if (error instanceof UnknownCollectionError) return respond(404, 'UNKNOWN_COLLECTION', error.message);
  if (error instanceof IngestionInProgressError) return respond(409, 'INGESTION_IN_PROGRESS', error.message);
  if (error instanceof LimiterError) {
    return error.errorType === 'QUEUE_FULL'
      ? respond(503, error.errorType, 'Service is temporarily overloaded. Please try again later.')
      : respond(504, error.errorType, 'Request timed out waiting in queue. Please try again.');
  }
  if (error instanceof TicketTrackerError) {
    return respond(TRACKER_STATUS[error.kind], `TRACKER_${error.kind.toUpperCase()}`, error.message);
  }
  if (error instanceof TimeoutError) return respond(504, 'TIMEOUT', error.message);
  if (error instanceof AbortError) return respond(503, 'CANCELLED', error.message);
  if (
    error instanceof CompletionServiceError ||
    error instanceof EmbeddingServiceError ||
    error instanceof VectorStoreError
  ) {
    return respond(error.retryable ? 503 : 502, 'UPSTREAM_ERROR', error.message);
  }

  return respond(500, 'INTERNAL_SERVER_ERROR', error instanceof Error ? error.message : 'An unexpected error occurred');
}
