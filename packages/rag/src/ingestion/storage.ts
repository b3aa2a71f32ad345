/**
 * Chunk Storage
 *
 * `VectorStore` is what ingestion and retrieval see; `MilvusVectorStore` keeps
 * every logical collection in one Milvus collection, separated by the
 * `collection` field, with one row per (path, version, chunk index).
 *
 * @module @docpilot/rag/ingestion/storage
 */

import { ErrorCode, type MilvusClient } from '@zilliz/milvus2-sdk-node';
import { DEFAULT_COLLECTION_NAME } from '@docpilot/database';
import { z } from 'zod';
import { VectorStoreError, errorMessage, looksLikeConnectionError } from '../errors';
import type { EmbeddedChunk, ScoredChunk } from '../types';

export interface VectorQuery {
  collection: string;
  vector: number[];
  topK: number;
  minScore: number;
}

export interface VectorStore {
  /** Write chunks; all of them belong to the same collection */
  upsert(collection: string, chunks: EmbeddedChunk[]): Promise<void>;
  /**
   * Delete the chunks of one document. Without `version` every version goes.
   * Resolves to the number of deleted chunks.
   */
  deleteDocument(collection: string, path: string, version?: number): Promise<number>;
  /** Hits at or above `minScore`, best first */
  query(query: VectorQuery): Promise<ScoredChunk[]>;
}

// ============================================================================
// Milvus
// ============================================================================

export interface MilvusStoreConfig {
  collectionName: string;
  batchSize: number;
  /** HNSW search breadth; raised to topK when smaller */
  ef: number;
}

const DEFAULT_CONFIG: MilvusStoreConfig = {
  collectionName: DEFAULT_COLLECTION_NAME,
  batchSize: 100,
  ef: 64,
};

const OUTPUT_FIELDS = [
  'chunk_id',
  'collection',
  'path',
  'version',
  'chunk_index',
  'token_count',
  'content_hash',
  'content_text',
  'metadata',
];

const metadataSchema = z.object({
  title: z.string().optional(),
  url: z.string().optional(),
});

// Int64 fields arrive as strings, JSON fields either parsed or raw
const hitSchema = z.object({
  score: z.number(),
  chunk_id: z.string(),
  collection: z.string(),
  path: z.string(),
  version: z.coerce.number(),
  chunk_index: z.coerce.number(),
  token_count: z.coerce.number(),
  content_hash: z.string(),
  content_text: z.string(),
  metadata: z
    .union([
      z.string().transform((raw, ctx): unknown => {
        try {
          return JSON.parse(raw);
        } catch {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'metadata is not valid JSON' });
          return z.NEVER;
        }
      }),
      z.record(z.unknown()),
    ])
    .pipe(metadataSchema)
    .nullish(),
});

/**
 * Quote a value for a Milvus boolean expression
 */
export function quoteFilterValue(value: string): string {
  return JSON.stringify(value);
}

interface MilvusStatus {
  error_code: string | number;
  reason: string;
}

export class MilvusVectorStore implements VectorStore {
  private client: MilvusClient;
  private config: MilvusStoreConfig;

  constructor(client: MilvusClient, config: Partial<MilvusStoreConfig> = {}) {
    this.client = client;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async upsert(collection: string, chunks: EmbeddedChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    for (let i = 0; i < chunks.length; i += this.config.batchSize) {
      const batch = chunks.slice(i, i + this.config.batchSize);
      const data = batch.map((chunk) => ({
        chunk_id: chunk.id,
        vector: chunk.embedding,
        collection,
        path: chunk.path,
        version: chunk.version,
        chunk_index: chunk.chunkIndex,
        token_count: chunk.tokenCount,
        content_hash: chunk.contentHash,
        content_text: chunk.text,
        metadata: { title: chunk.title, url: chunk.url },
      }));

      const result = await this.call('upsert', () =>
        this.client.upsert({ collection_name: this.config.collectionName, data })
      );
      this.assertSuccess('upsert', result.status);
    }

    const flushed = await this.call('flush', () =>
      this.client.flush({ collection_names: [this.config.collectionName] })
    );
    this.assertSuccess('flush', flushed.status);
  }

  async deleteDocument(collection: string, path: string, version?: number): Promise<number> {
    const clauses = [
      `collection == ${quoteFilterValue(collection)}`,
      `path == ${quoteFilterValue(path)}`,
    ];
    if (version !== undefined) {
      clauses.push(`version == ${version}`);
    }

    const result = await this.call('delete', () =>
      this.client.delete({
        collection_name: this.config.collectionName,
        filter: clauses.join(' && '),
      })
    );
    this.assertSuccess('delete', result.status);

    return Number(result.delete_cnt) || 0;
  }

  async query(query: VectorQuery): Promise<ScoredChunk[]> {
    const result = await this.call('search', () =>
      this.client.search({
        collection_name: this.config.collectionName,
        data: query.vector,
        limit: query.topK,
        filter: `collection == ${quoteFilterValue(query.collection)}`,
        output_fields: OUTPUT_FIELDS,
        params: { ef: Math.max(this.config.ef, query.topK) },
      })
    );
    this.assertSuccess('search', result.status);

    const rows: unknown[] = [];
    for (const entry of result.results) {
      if (Array.isArray(entry)) rows.push(...entry);
      else rows.push(entry);
    }

    const hits: ScoredChunk[] = [];
    for (const row of rows) {
      const parsed = hitSchema.safeParse(row);
      if (!parsed.success) {
        console.warn('[vector-store] Skipping malformed search hit:', parsed.error.issues[0]?.message);
        continue;
      }
      const hit = parsed.data;
      if (hit.score < query.minScore) continue;

      hits.push({
        score: hit.score,
        chunk: {
          id: hit.chunk_id,
          collection: hit.collection,
          path: hit.path,
          version: hit.version,
          contentHash: hit.content_hash,
          chunkIndex: hit.chunk_index,
          text: hit.content_text,
          tokenCount: hit.token_count,
          title: hit.metadata?.title,
          url: hit.metadata?.url,
        },
      });
    }

    return hits.sort((a, b) => b.score - a.score);
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof VectorStoreError) throw error;
      throw new VectorStoreError(`Milvus ${operation} failed: ${errorMessage(error)}`, {
        unavailable: looksLikeConnectionError(error),
        cause: error,
      });
    }
  }

  private assertSuccess(operation: string, status: MilvusStatus): void {
    if (status.error_code === ErrorCode.SUCCESS) return;

    throw new VectorStoreError(`Milvus ${operation} failed: ${status.reason || status.error_code}`, {
      unavailable: looksLikeConnectionError(status.reason),
    });
  }
}
