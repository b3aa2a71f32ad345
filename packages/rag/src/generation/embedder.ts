/**
 * Embedding Client
 *
 * Client for any OpenAI-compatible `/embeddings` endpoint.
 *
 * @module @docpilot/rag/generation/embedder
 */

import { withTimeout, TimeoutError, AbortError } from '@docpilot/database';
import { z } from 'zod';
import { EmbeddingServiceError, errorMessage } from '../errors';
import type { ComponentHealth } from '../types';

/**
 * Order-preserving text embedding
 */
export interface EmbeddingService {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface EmbeddingClientConfig {
  /** Base URL, e.g. https://api.openai.com/v1 */
  baseUrl: string;
  apiKey?: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

const DEFAULT_CONFIG: EmbeddingClientConfig = {
  baseUrl: 'http://localhost:8001/v1',
  model: 'text-embedding-3-small',
  dimensions: 1536,
  timeoutMs: 30000,
};

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int(),
      embedding: z.array(z.number()),
    })
  ),
});

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class OpenAICompatibleEmbedder implements EmbeddingService {
  private config: EmbeddingClientConfig;
  private fetchImpl: FetchLike;

  constructor(config: Partial<EmbeddingClientConfig> = {}, fetchImpl: FetchLike = fetch) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fetchImpl = fetchImpl;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], signal);
    return vector;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      return await withTimeout(
        (timeoutSignal) => this.request(texts, timeoutSignal),
        this.config.timeoutMs,
        'Embedding request',
        signal
      );
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof AbortError) throw error;
      if (error instanceof EmbeddingServiceError) throw error;
      // fetch itself failed: network trouble
      throw new EmbeddingServiceError(`Embedding request failed: ${errorMessage(error)}`, {
        retryable: true,
        cause: error,
      });
    }
  }

  async healthCheck(): Promise<ComponentHealth> {
    const start = Date.now();
    try {
      await this.embed('health check');
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { healthy: false, latencyMs: Date.now() - start, message: errorMessage(error) };
    }
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  private async request(input: string[], signal: AbortSignal): Promise<number[][]> {
    const response = await this.fetchImpl(`${this.config.baseUrl.replace(/\/$/, '')}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
      },
      body: JSON.stringify({ model: this.config.model, input, encoding_format: 'float' }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      // 408, 429 and 5xx are worth another attempt; other 4xx reject the input
      const retryable = response.status === 408 || response.status === 429 || response.status >= 500;
      throw new EmbeddingServiceError(`Embedding API error: ${response.status} - ${body.slice(0, 200)}`, {
        retryable,
        statusCode: response.status,
      });
    }

    const parsed = embeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.data.length !== input.length) {
      throw new EmbeddingServiceError('Embedding API returned an unexpected payload', {
        retryable: false,
      });
    }

    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}

export function createEmbedder(config: Partial<EmbeddingClientConfig> = {}): OpenAICompatibleEmbedder {
  return new OpenAICompatibleEmbedder(config);
}
