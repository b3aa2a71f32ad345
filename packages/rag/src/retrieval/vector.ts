/**
 * Vector Retriever
 *
 * Embeds the question once, queries every requested collection with the same
 * vector, and merges the hits into one ranking. Only the newest version of a
 * document survives, so a read racing an ingestion replace never mixes
 * versions.
 *
 * @module @docpilot/rag/retrieval/vector
 */

import { withTimeout } from '@docpilot/database';
import type { EmbeddingService } from '../generation/embedder';
import type { VectorStore } from '../ingestion/storage';
import type { Query, ScoredChunk } from '../types';

export interface RetrieverConfig {
  /** Hits requested per collection */
  topK: number;
  minScore: number;
  queryTimeoutMs: number;
}

const DEFAULT_CONFIG: RetrieverConfig = {
  topK: 8,
  minScore: 0.5,
  queryTimeoutMs: 10000,
};

/**
 * Best first; equal scores ordered by collection, path, then chunk index
 */
export function compareHits(a: ScoredChunk, b: ScoredChunk): number {
  return (
    b.score - a.score ||
    a.chunk.collection.localeCompare(b.chunk.collection) ||
    a.chunk.path.localeCompare(b.chunk.path) ||
    a.chunk.chunkIndex - b.chunk.chunkIndex
  );
}

/**
 * Drop chunks of every document version older than the newest one present
 */
export function keepNewestVersions(hits: ScoredChunk[]): ScoredChunk[] {
  const newest = new Map<string, number>();
  for (const { chunk } of hits) {
    const key = `${chunk.collection}\u0000${chunk.path}`;
    newest.set(key, Math.max(newest.get(key) ?? 0, chunk.version));
  }
  return hits.filter(({ chunk }) => newest.get(`${chunk.collection}\u0000${chunk.path}`) === chunk.version);
}

export class VectorRetriever {
  private embedder: EmbeddingService;
  private store: VectorStore;
  private config: RetrieverConfig;

  constructor(embedder: EmbeddingService, store: VectorStore, config: Partial<RetrieverConfig> = {}) {
    this.embedder = embedder;
    this.store = store;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Ranked hits across `query.collections`, never below the score threshold
   */
  async retrieve(query: Query, signal?: AbortSignal): Promise<ScoredChunk[]> {
    const collections = [...new Set(query.collections)];
    if (collections.length === 0) return [];

    const topK = query.topK ?? this.config.topK;
    const minScore = query.minScore ?? this.config.minScore;
    const vector = await this.embedder.embed(query.question, signal);

    const perCollection = await Promise.all(
      collections.map((collection) =>
        withTimeout(
          () => this.store.query({ collection, vector, topK, minScore }),
          this.config.queryTimeoutMs,
          `Vector query ${collection}`,
          signal
        )
      )
    );

    const hits = perCollection.flat().filter((hit) => hit.score >= minScore);
    return keepNewestVersions(hits).sort(compareHits);
  }

  get topK(): number {
    return this.config.topK;
  }

  get minScore(): number {
    return this.config.minScore;
  }
}

export function createRetriever(
  embedder: EmbeddingService,
  store: VectorStore,
  config?: Partial<RetrieverConfig>
): VectorRetriever {
  return new VectorRetriever(embedder, store, config);
}
