/**
 * Error taxonomy for sources, embeddings and the vector store.
 * Every class carries `retryable`, which is what `withRetry` callers test.
 *
 * @module @docpilot/rag/errors
 */

import { TimeoutError } from '@docpilot/database';
import type { IngestionFailureKind, IngestionReport } from './types';

export class TransientSourceError extends Error {
  public readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientSourceError';
  }
}

/** `rejected`: the source refused the request itself (malformed id, unsupported type) */
export type PermanentSourceReason = 'not_found' | 'access_denied' | 'rejected' | 'empty_document';

export class PermanentSourceError extends Error {
  public readonly retryable = false;
  public readonly reason: PermanentSourceReason;

  constructor(message: string, reason: PermanentSourceReason, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PermanentSourceError';
    this.reason = reason;
  }
}

export class EmbeddingServiceError extends Error {
  public readonly retryable: boolean;
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: { retryable: boolean; statusCode?: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'EmbeddingServiceError';
    this.retryable = options.retryable;
    this.statusCode = options.statusCode;
  }
}

/**
 * Vector store failure. `unavailable` marks an outage of the store itself, which
 * aborts a whole ingestion run instead of a single document.
 */
export class VectorStoreError extends Error {
  public readonly unavailable: boolean;
  public readonly retryable: boolean;

  constructor(message: string, options: { unavailable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'VectorStoreError';
    this.unavailable = options.unavailable;
    this.retryable = options.unavailable;
  }
}

/**
 * The ingestion ledger could not be read or written
 */
export class LedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

export class IngestionInProgressError extends Error {
  public readonly collection: string;
  public readonly owner: string;

  constructor(collection: string, owner: string) {
    super(`Ingestion for collection "${collection}" is already running (${owner})`);
    this.name = 'IngestionInProgressError';
    this.collection = collection;
    this.owner = owner;
  }
}

export class UnknownCollectionError extends Error {
  public readonly collection: string;

  constructor(collection: string) {
    super(`Collection "${collection}" is not configured`);
    this.name = 'UnknownCollectionError';
    this.collection = collection;
  }
}

/**
 * An ingestion run failed as a whole: the listing failed or a store went away.
 * `report` holds what was done before the run stopped.
 */
export class IngestionRunError extends Error {
  public readonly collection: string;
  public readonly report?: IngestionReport;

  constructor(
    message: string,
    options: { collection: string; report?: IngestionReport; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'IngestionRunError';
    this.collection = options.collection;
    this.report = options.report;
  }
}

const CONNECTION_MARKERS = [
  'econnrefused',
  'econnreset',
  'enotfound',
  'etimedout',
  'unavailable',
  'deadline exceeded',
  'socket hang up',
  'network',
];

/**
 * Whether an SDK or driver error message describes an unreachable service
 */
export function looksLikeConnectionError(error: unknown): boolean {
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return CONNECTION_MARKERS.some((marker) => message.includes(marker));
}

/**
 * True when an error means the run cannot continue for any document
 */
export function isStoreOutage(error: unknown): boolean {
  return (error instanceof VectorStoreError && error.unavailable) || error instanceof LedgerError;
}

export function failureKindOf(error: unknown): IngestionFailureKind {
  if (error instanceof PermanentSourceError) return error.reason;
  if (error instanceof TransientSourceError) return 'transient';
  if (error instanceof EmbeddingServiceError) return 'embedding';
  if (error instanceof VectorStoreError) return 'vector_store';
  if (error instanceof TimeoutError) return 'transient';
  return 'unknown';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
