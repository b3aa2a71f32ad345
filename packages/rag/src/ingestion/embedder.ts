/**
 * Batch Embedding for Ingestion
 *
 * Embeds the chunks of one document in batches. Every batch goes through the
 * shared limiter, so all workers together respect the embedding service's
 * throughput; transient failures are retried with backoff. A document is
 * embedded completely or not at all.
 *
 * @module @docpilot/rag/ingestion/embedder
 */

import { withRetry, isRetryableError, type RetryOptions } from '@docpilot/database';
import type { ConcurrencyLimiter } from '../concurrency/limiter';
import { EmbeddingServiceError } from '../errors';
import type { EmbeddingService } from '../generation/embedder';

export interface BatchEmbedderConfig {
  /** Texts per embedding call */
  batchSize: number;
  retry: Pick<RetryOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs' | 'sleep'>;
}

const DEFAULT_CONFIG: BatchEmbedderConfig = {
  batchSize: 32,
  retry: { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 30000 },
};

export class BatchEmbedder {
  private service: EmbeddingService;
  private limiter: ConcurrencyLimiter;
  private config: BatchEmbedderConfig;

  constructor(
    service: EmbeddingService,
    limiter: ConcurrencyLimiter,
    config: Partial<BatchEmbedderConfig> = {}
  ) {
    this.service = service;
    this.limiter = limiter;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Vectors for `texts`, in the same order
   */
  async embedAll(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      const batch = texts.slice(i, i + this.config.batchSize);
      const embedded = await withRetry(
        () => this.limiter.run(() => this.service.embedBatch(batch, signal), signal),
        {
          ...this.config.retry,
          shouldRetry: isRetryableError,
          signal,
          label: 'Embedding batch',
        }
      );

      if (embedded.length !== batch.length) {
        throw new EmbeddingServiceError(
          `Embedding service returned ${embedded.length} vectors for ${batch.length} texts`,
          { retryable: false }
        );
      }
      vectors.push(...embedded);
    }

    return vectors;
  }

  getConfig(): BatchEmbedderConfig {
    return { ...this.config };
  }
}
