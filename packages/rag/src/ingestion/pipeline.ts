/**
 * Ingestion Pipeline
 *
 * Keeps one collection of the vector store in step with its source:
 *
 * 1. List documents (include/exclude re-applied, duplicates dropped)
 * 2. Fetch and hash each one; an unchanged hash means no writes at all
 * 3. Chunk and embed changed documents, then, serialized per document:
 *    upsert the new version, delete the previous version, save the record
 * 4. Tombstone pass: recorded paths that were not listed lose their chunks
 *    and record
 *
 * Document failures end up in the report. Only a store outage (vector store
 * unreachable, ledger failing) stops the run, after in-flight documents finish.
 *
 * @module @docpilot/rag/ingestion/pipeline
 */

import {
  AbortError,
  isRetryableError,
  withRetry,
  withTimeout,
  type RetryOptions,
} from '@docpilot/database';
import { KeyedMutex } from '../concurrency/mutex';
import { runWithConcurrency } from '../concurrency/pool';
import {
  IngestionRunError,
  PermanentSourceError,
  errorMessage,
  failureKindOf,
  isStoreOutage,
} from '../errors';
import { createPathFilter, type SourceAdapter } from '../sources/adapter';
import type {
  DocumentDescriptor,
  EmbeddedChunk,
  IngestionFailure,
  IngestionRecord,
  IngestionReport,
  SourceConfig,
} from '../types';
import type { DocumentChunker } from './chunker';
import type { BatchEmbedder } from './embedder';
import { chunkId, contentHash } from './hashing';
import type { IngestionLedger } from './ledger';
import type { VectorStore } from './storage';

// ============================================================================
// Configuration
// ============================================================================

export interface IngestionPipelineConfig {
  /** Documents processed in parallel */
  concurrency: number;
  listTimeoutMs: number;
  fetchTimeoutMs: number;
  storeTimeoutMs: number;
  retry: Pick<RetryOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs' | 'sleep'>;
  now: () => Date;
}

const DEFAULT_CONFIG: IngestionPipelineConfig = {
  concurrency: 4,
  listTimeoutMs: 120000,
  fetchTimeoutMs: 30000,
  storeTimeoutMs: 60000,
  retry: { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 30000 },
  now: () => new Date(),
};

export interface IngestionDependencies {
  adapter: SourceAdapter;
  chunker: DocumentChunker;
  embedder: BatchEmbedder;
  store: VectorStore;
  ledger: IngestionLedger;
  /** Shared between pipelines that may touch the same documents */
  mutex?: KeyedMutex;
}

export interface SyncOptions {
  signal?: AbortSignal;
}

type DocumentOutcome = 'ingested' | 'unchanged';

interface AttemptTracker {
  attempts: number;
}

// ============================================================================
// Pipeline
// ============================================================================

export class IngestionPipeline {
  private deps: IngestionDependencies;
  private mutex: KeyedMutex;
  private config: IngestionPipelineConfig;

  constructor(deps: IngestionDependencies, config: Partial<IngestionPipelineConfig> = {}) {
    this.deps = deps;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async sync(collection: string, source: SourceConfig, options: SyncOptions = {}): Promise<IngestionReport> {
    const { signal } = options;
    const startedAt = this.config.now();
    const failures: IngestionFailure[] = [];
    let ingested = 0;
    let unchanged = 0;
    let deleted = 0;
    let outage: unknown = null;

    const buildReport = (cancelled: boolean): IngestionReport => ({
      collection,
      ingested,
      unchanged,
      deleted,
      failed: failures.length,
      failures,
      cancelled,
      startedAt,
      finishedAt: this.config.now(),
    });

    console.log(`[ingest] ${collection}: listing "${source.path}" from ${this.deps.adapter.name}`);

    let descriptors: DocumentDescriptor[];
    let records: Map<string, IngestionRecord>;
    try {
      descriptors = await this.listDocuments(source, signal);
      records = new Map((await this.deps.ledger.list(collection)).map((r) => [r.path, r]));
    } catch (error) {
      console.error(`[ingest] ${collection}: run failed before processing: ${errorMessage(error)}`);
      throw new IngestionRunError(`Ingestion of "${collection}" failed: ${errorMessage(error)}`, {
        collection,
        cause: error,
      });
    }

    console.log(`[ingest] ${collection}: ${descriptors.length} documents listed, ${records.size} on record`);

    const pool = await runWithConcurrency(
      descriptors,
      this.config.concurrency,
      async (descriptor) => {
        const record = records.get(descriptor.path) ?? null;
        const tracker: AttemptTracker = { attempts: 0 };

        try {
          const outcome = await this.syncDocument(collection, descriptor, record, tracker, signal);
          if (outcome === 'ingested') ingested++;
          else unchanged++;
        } catch (error) {
          if (isStoreOutage(error)) {
            outage ??= error;
            return;
          }
          if (error instanceof AbortError && signal?.aborted) {
            return;
          }

          const failure: IngestionFailure = {
            path: descriptor.path,
            kind: failureKindOf(error),
            message: errorMessage(error),
            attempts: Math.max(1, tracker.attempts),
          };
          failures.push(failure);
          console.warn(`[ingest] ${collection}/${failure.path} failed (${failure.kind}): ${failure.message}`);

          if (record) {
            try {
              await this.deps.ledger.recordFailure(collection, descriptor.path, failure.message, this.config.now());
            } catch (ledgerError) {
              outage ??= ledgerError;
            }
          }
        }
      },
      { signal, shouldStop: () => outage !== null }
    );

    if (outage !== null) {
      const report = buildReport(Boolean(signal?.aborted));
      console.error(`[ingest] ${collection}: store outage, run aborted: ${errorMessage(outage)}`);
      throw new IngestionRunError(`Ingestion of "${collection}" aborted: ${errorMessage(outage)}`, {
        collection,
        report,
        cause: outage,
      });
    }

    const cancelled = pool.interrupted || Boolean(signal?.aborted);
    if (cancelled) {
      console.warn(`[ingest] ${collection}: cancelled, tombstone pass skipped`);
    } else {
      const listed = new Set(descriptors.map((d) => d.path));
      for (const record of records.values()) {
        if (listed.has(record.path)) continue;

        try {
          await this.removeDocument(collection, record.path);
          deleted++;
        } catch (error) {
          if (isStoreOutage(error)) {
            throw new IngestionRunError(`Ingestion of "${collection}" aborted: ${errorMessage(error)}`, {
              collection,
              report: buildReport(false),
              cause: error,
            });
          }
          failures.push({
            path: record.path,
            kind: failureKindOf(error),
            message: errorMessage(error),
            attempts: 1,
          });
        }
      }
    }

    const report = buildReport(cancelled);
    console.log(
      `[ingest] ${collection}: ${report.ingested} ingested, ${report.unchanged} unchanged, ` +
        `${report.deleted} deleted, ${report.failed} failed` +
        (report.cancelled ? ' (cancelled)' : '') +
        ` in ${report.finishedAt.getTime() - report.startedAt.getTime()}ms`
    );
    return report;
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async listDocuments(source: SourceConfig, signal?: AbortSignal): Promise<DocumentDescriptor[]> {
    const accept = createPathFilter(source.include, source.exclude);
    const listed = await withRetry(
      () =>
        withTimeout(
          (timeoutSignal) => this.deps.adapter.list(source, timeoutSignal),
          this.config.listTimeoutMs,
          `List ${source.path}`,
          signal
        ),
      { ...this.config.retry, shouldRetry: isRetryableError, signal, label: `List ${source.path}` }
    );

    const unique = new Map<string, DocumentDescriptor>();
    for (const descriptor of listed) {
      if (accept(descriptor.path) && !unique.has(descriptor.path)) {
        unique.set(descriptor.path, descriptor);
      }
    }
    return [...unique.values()];
  }

  private async syncDocument(
    collection: string,
    descriptor: DocumentDescriptor,
    record: IngestionRecord | null,
    tracker: AttemptTracker,
    signal?: AbortSignal
  ): Promise<DocumentOutcome> {
    const { path } = descriptor;

    const fetched = await withRetry(
      (attempt) => {
        tracker.attempts = attempt;
        return withTimeout(
          (timeoutSignal) => this.deps.adapter.fetch(descriptor, timeoutSignal),
          this.config.fetchTimeoutMs,
          `Fetch ${path}`,
          signal
        );
      },
      { ...this.config.retry, shouldRetry: isRetryableError, signal, label: `Fetch ${collection}/${path}` }
    );

    const hash = contentHash(fetched.content);
    if (record && record.contentHash === hash) {
      return 'unchanged';
    }

    const pieces = this.deps.chunker.chunk(fetched.content);
    if (pieces.length === 0) {
      throw new PermanentSourceError(`Document has no text content: ${path}`, 'empty_document');
    }

    const vectors = await this.deps.embedder.embedAll(
      pieces.map((piece) => piece.text),
      signal
    );

    // last point where cancellation is honoured; the replace below always completes
    if (signal?.aborted) {
      throw new AbortError();
    }

    const version = (record?.version ?? 0) + 1;
    const title = fetched.descriptor.title ?? descriptor.title;
    const url = fetched.descriptor.url ?? descriptor.url;
    const chunks: EmbeddedChunk[] = pieces.map((piece, i) => ({
      id: chunkId(collection, path, version, piece.index),
      collection,
      path,
      version,
      contentHash: hash,
      chunkIndex: piece.index,
      text: piece.text,
      tokenCount: piece.tokenCount,
      title,
      url,
      embedding: vectors[i],
    }));

    await this.mutex.runExclusive(this.documentKey(collection, path), async () => {
      try {
        await this.storeCall('upsert', () => this.deps.store.upsert(collection, chunks));
      } catch (error) {
        await this.discardVersion(collection, path, version);
        throw error;
      }

      if (record) {
        await this.storeCall('delete', () => this.deps.store.deleteDocument(collection, path, record.version));
      }

      const now = this.config.now();
      await this.deps.ledger.save({
        collection,
        path,
        contentHash: hash,
        version,
        title: title ?? null,
        url: url ?? null,
        chunkCount: chunks.length,
        lastSuccessAt: now,
        lastAttemptAt: now,
        lastError: null,
      });
    });

    console.log(`[ingest] ${collection}/${path}: version ${version}, ${chunks.length} chunks`);
    return 'ingested';
  }

  private async removeDocument(collection: string, path: string): Promise<void> {
    await this.mutex.runExclusive(this.documentKey(collection, path), async () => {
      await this.storeCall('delete', () => this.deps.store.deleteDocument(collection, path));
      await this.deps.ledger.delete(collection, path);
    });
    console.log(`[ingest] ${collection}/${path}: removed from source, chunks and record deleted`);
  }

  /**
   * Remove whatever part of a failed upsert made it into the store
   */
  private async discardVersion(collection: string, path: string, version: number): Promise<void> {
    try {
      await this.storeCall('delete', () => this.deps.store.deleteDocument(collection, path, version));
    } catch (error) {
      console.error(
        `[ingest] ${collection}/${path}: could not remove partial version ${version}: ${errorMessage(error)}`
      );
    }
  }

  private storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      () => withTimeout(() => fn(), this.config.storeTimeoutMs, `Vector store ${operation}`),
      { ...this.config.retry, shouldRetry: isRetryableError, label: `Vector store ${operation}` }
    );
  }

  private documentKey(collection: string, path: string): string {
    return `${collection}\u0000${path}`;
  }
}

export function createIngestionPipeline(
  deps: IngestionDependencies,
  config?: Partial<IngestionPipelineConfig>
): IngestionPipeline {
  return new IngestionPipeline(deps, config);
}
