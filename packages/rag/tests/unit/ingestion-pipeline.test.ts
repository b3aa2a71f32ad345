/**
 * Ingestion Pipeline Tests
 *
 * Incremental sync against in-memory store, ledger and source.
 *
 * @module @docpilot/rag/tests/unit/ingestion-pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConcurrencyLimiter } from '../../src/concurrency/limiter';
import {
  IngestionRunError,
  LedgerError,
  PermanentSourceError,
  TransientSourceError,
  VectorStoreError,
} from '../../src/errors';
import { createChunker } from '../../src/ingestion/chunker';
import { BatchEmbedder } from '../../src/ingestion/embedder';
import { contentHash } from '../../src/ingestion/hashing';
import { IngestionPipeline } from '../../src/ingestion/pipeline';
import type { SourceConfig } from '../../src/types';
import { FakeEmbeddingService, FakeSourceAdapter, InMemoryLedger, InMemoryVectorStore } from '../support/fakes';

// ============================================================================
// Fixtures
// ============================================================================

const COLLECTION = 'handbook';
const SOURCE: SourceConfig = { path: '.', recursive: true };
const noSleep = () => Promise.resolve();

const DOC_A = '# Install\n\nRun the installer.\n\n# Deploy\n\nRun the release script.';
const DOC_A_V2 = '# Install\n\nRun the new installer.\n\n# Deploy\n\nRun the release script twice.';

function setup(documents: Record<string, string>) {
  const adapter = new FakeSourceAdapter(documents);
  const store = new InMemoryVectorStore();
  const ledger = new InMemoryLedger();
  const embeddings = new FakeEmbeddingService();
  const retry = { maxRetries: 2, initialDelayMs: 0, sleep: noSleep };
  let tick = 0;

  const pipeline = new IngestionPipeline(
    {
      adapter,
      chunker: createChunker({ language: 'en' }),
      embedder: new BatchEmbedder(embeddings, new ConcurrencyLimiter({ maxConcurrent: 2 }), { batchSize: 8, retry }),
      store,
      ledger,
    },
    { concurrency: 2, retry, now: () => new Date(Date.UTC(2024, 0, 1) + tick++ * 1000) }
  );

  return { pipeline, adapter, store, ledger, embeddings };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// Change Detection
// ============================================================================

describe('IngestionPipeline', () => {
  describe('change detection', () => {
    it('should store the chunks of a new document under version 1', async () => {
      const { pipeline, store, ledger } = setup({ 'a.md': DOC_A });

      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report).toMatchObject({ ingested: 1, unchanged: 0, deleted: 0, failed: 0, cancelled: false });
      expect(store.documentChunks(COLLECTION, 'a.md').map((c) => [c.version, c.chunkIndex])).toEqual([
        [1, 0],
        [1, 1],
      ]);
      expect(await ledger.get(COLLECTION, 'a.md')).toMatchObject({
        contentHash: contentHash(DOC_A),
        version: 1,
        chunkCount: 2,
        lastError: null,
      });
    });

    it('should make no writes when the content is unchanged', async () => {
      const { pipeline, store, ledger } = setup({ 'a.md': DOC_A });
      await pipeline.sync(COLLECTION, SOURCE);
      const writes = store.writes;
      const saves = ledger.saves;
      const record = await ledger.get(COLLECTION, 'a.md');

      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report).toMatchObject({ ingested: 0, unchanged: 1, failed: 0 });
      expect(store.writes).toBe(writes);
      expect(ledger.saves).toBe(saves);
      expect(await ledger.get(COLLECTION, 'a.md')).toEqual(record);
    });

    it('should replace the chunks under version 2 when the content changes', async () => {
      const { pipeline, adapter, store, ledger } = setup({ 'a.md': DOC_A });
      await pipeline.sync(COLLECTION, SOURCE);

      adapter.documents.set('a.md', DOC_A_V2);
      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report.ingested).toBe(1);
      const chunks = store.documentChunks(COLLECTION, 'a.md');
      expect(chunks.map((c) => c.version)).toEqual([2, 2]);
      expect(chunks[0].text).toBe('# Install\n\nRun the new installer.');
      expect(await ledger.get(COLLECTION, 'a.md')).toMatchObject({
        contentHash: contentHash(DOC_A_V2),
        version: 2,
      });
    });

    it('should apply include and exclude patterns', async () => {
      const { pipeline, adapter } = setup({ 'a.md': DOC_A, 'drafts/b.md': 'Draft.', 'c.txt': 'Plain.' });

      const report = await pipeline.sync(COLLECTION, { ...SOURCE, include: '\\.md$', exclude: '^drafts/' });

      expect(report.ingested).toBe(1);
      expect(adapter.fetches).toEqual(['a.md']);
    });
  });

  // ==========================================================================
  // Tombstones
  // ==========================================================================

  describe('tombstone pass', () => {
    it('should delete chunks and record of documents no longer listed', async () => {
      const { pipeline, adapter, store, ledger } = setup({ 'a.md': DOC_A, 'b.md': 'Second page.' });
      await pipeline.sync(COLLECTION, SOURCE);

      adapter.documents.delete('b.md');
      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report).toMatchObject({ unchanged: 1, deleted: 1 });
      expect(store.documentChunks(COLLECTION, 'b.md')).toEqual([]);
      expect(await ledger.get(COLLECTION, 'b.md')).toBeNull();
      expect(store.documentChunks(COLLECTION, 'a.md')).toHaveLength(2);
    });

    it('should leave other collections alone', async () => {
      const { pipeline, ledger } = setup({ 'a.md': DOC_A });
      await ledger.save({
        collection: 'other',
        path: 'z.md',
        contentHash: 'h',
        version: 1,
        title: null,
        url: null,
        chunkCount: 1,
        lastSuccessAt: null,
        lastAttemptAt: new Date(0),
        lastError: null,
      });

      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report.deleted).toBe(0);
      expect(await ledger.get('other', 'z.md')).not.toBeNull();
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe('per-document failures', () => {
    it('should record a permanent failure without retrying and keep going', async () => {
      const { pipeline, adapter } = setup({ 'a.md': DOC_A, 'b.md': 'Secret.' });
      adapter.fetchErrors.set('b.md', [new PermanentSourceError('Access denied: b.md', 'access_denied')]);

      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report.ingested).toBe(1);
      expect(report.failures).toEqual([
        { path: 'b.md', kind: 'access_denied', message: 'Access denied: b.md', attempts: 1 },
      ]);
    });

    it('should retry transient errors until the fetch succeeds', async () => {
      const { pipeline, adapter } = setup({ 'a.md': DOC_A });
      adapter.fetchErrors.set('a.md', [new TransientSourceError('503'), new TransientSourceError('503')]);

      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report.ingested).toBe(1);
      expect(adapter.fetches).toEqual(['a.md', 'a.md', 'a.md']);
    });

    it('should report a transient failure once the retries are used up', async () => {
      const { pipeline, adapter } = setup({ 'a.md': DOC_A });
      adapter.fetchErrors.set('a.md', [
        new TransientSourceError('503'),
        new TransientSourceError('503'),
        new TransientSourceError('still 503'),
      ]);

      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report.failures).toEqual([{ path: 'a.md', kind: 'transient', message: 'still 503', attempts: 3 }]);
    });

    it('should note the failure on an existing record and keep its chunks', async () => {
      const { pipeline, adapter, store, ledger } = setup({ 'a.md': DOC_A });
      await pipeline.sync(COLLECTION, SOURCE);

      adapter.fetchErrors.set('a.md', [new PermanentSourceError('Gone for now', 'not_found')]);
      await pipeline.sync(COLLECTION, SOURCE);

      expect(await ledger.get(COLLECTION, 'a.md')).toMatchObject({ version: 1, lastError: 'Gone for now' });
      expect(store.documentChunks(COLLECTION, 'a.md')).toHaveLength(2);
    });

    it('should treat a document without text as a permanent failure', async () => {
      const { pipeline, adapter, store } = setup({ 'a.md': DOC_A });
      await pipeline.sync(COLLECTION, SOURCE);

      adapter.documents.set('a.md', '   \n\n  ');
      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report.failures.map((f) => f.kind)).toEqual(['empty_document']);
      expect(store.documentChunks(COLLECTION, 'a.md').map((c) => c.version)).toEqual([1, 1]);
    });

    it('should remove a partially written version and keep the previous one', async () => {
      const { pipeline, adapter, store, ledger } = setup({ 'a.md': DOC_A });
      await pipeline.sync(COLLECTION, SOURCE);

      adapter.documents.set('a.md', DOC_A_V2);
      store.failNextUpsert = new VectorStoreError('write rejected', { unavailable: false });
      store.partialWrite = 1;
      const report = await pipeline.sync(COLLECTION, SOURCE);

      expect(report.failures).toEqual([{ path: 'a.md', kind: 'vector_store', message: 'write rejected', attempts: 1 }]);
      expect(store.documentChunks(COLLECTION, 'a.md').map((c) => c.version)).toEqual([1, 1]);
      expect(await ledger.get(COLLECTION, 'a.md')).toMatchObject({ version: 1, lastError: 'write rejected' });
    });
  });

  // ==========================================================================
  // Run-level failures
  // ==========================================================================

  describe('run-level failures', () => {
    it('should fail the run when listing fails, without touching records', async () => {
      const { pipeline, adapter, ledger } = setup({ 'a.md': DOC_A });
      await pipeline.sync(COLLECTION, SOURCE);

      adapter.listError = new PermanentSourceError('Space not found', 'not_found');

      await expect(pipeline.sync(COLLECTION, SOURCE)).rejects.toBeInstanceOf(IngestionRunError);
      expect(await ledger.get(COLLECTION, 'a.md')).not.toBeNull();
    });

    it('should abort the run with a partial report when the vector store is down', async () => {
      const { pipeline, store } = setup({ 'a.md': DOC_A, 'b.md': 'Second page.' });
      store.outage = new VectorStoreError('Milvus unreachable', { unavailable: true });

      const error = await pipeline.sync(COLLECTION, SOURCE).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IngestionRunError);
      expect(error instanceof IngestionRunError && error.report).toMatchObject({ ingested: 0, failed: 0 });
    });

    it('should abort the run when the ledger cannot be written', async () => {
      const { pipeline, ledger } = setup({ 'a.md': DOC_A });
      ledger.failWith = new LedgerError('ledger unavailable');

      await expect(pipeline.sync(COLLECTION, SOURCE)).rejects.toThrow('ledger unavailable');
    });
  });

  // ==========================================================================
  // Cancellation
  // ==========================================================================

  describe('cancellation', () => {
    it('should stop before replacing and skip the tombstone pass', async () => {
      const { pipeline, adapter, store, ledger } = setup({ 'a.md': DOC_A, 'old.md': 'Old page.' });
      await pipeline.sync(COLLECTION, SOURCE);

      adapter.documents.delete('old.md');
      adapter.documents.set('a.md', DOC_A_V2);
      let release: () => void = () => {};
      adapter.fetchGate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const controller = new AbortController();
      const running = pipeline.sync(COLLECTION, SOURCE, { signal: controller.signal });
      await vi.waitFor(() => expect(adapter.fetches).toHaveLength(3));
      controller.abort();
      release();

      const report = await running;

      expect(report).toMatchObject({ cancelled: true, ingested: 0, deleted: 0, failed: 0 });
      expect(await ledger.get(COLLECTION, 'old.md')).not.toBeNull();
      expect(store.documentChunks(COLLECTION, 'a.md').map((c) => c.version)).toEqual([1, 1]);
    });
  });
});
