/**
 * RAG Pipeline
 *
 * Turns a query into a grounded answer:
 * 1. Retrieval: embed the question, query each collection, merge by score
 * 2. Context: fill the token budget from the top of the ranking
 * 3. Generation: grounded prompt with numbered sources, blocking or streamed
 * 4. Citations: the sources the answer refers to
 *
 * A query without hits above the threshold never reaches the completion
 * service; it gets a `no_grounded_answer` result instead.
 *
 * @module @docpilot/rag/pipeline
 */

import type { ChatCompletionService } from './generation/llm';
import { numberSources, selectCitations } from './generation/citations';
import { NO_GROUNDED_ANSWER_TEXT, buildChatMessages } from './generation/prompts';
import { Channel } from './generation/streaming';
import type { TokenLanguage } from './ingestion/chunker';
import { fitTokenBudget } from './retrieval/context';
import type { VectorRetriever } from './retrieval/vector';
import type { Answer, AnswerStream, Query, ScoredChunk } from './types';

/**
 * Configuration for RAGPipeline
 */
export interface RAGPipelineConfig {
  /** Context size in tokens when the query sets none */
  tokenBudget: number;
  /** Fragments buffered ahead of a slow stream consumer */
  streamBufferSize: number;
  language: TokenLanguage;
}

const DEFAULT_CONFIG: RAGPipelineConfig = {
  tokenBudget: 3000,
  streamBufferSize: 16,
  language: 'mixed',
};

export class RAGPipeline {
  private retriever: VectorRetriever;
  private completion: ChatCompletionService;
  private config: RAGPipelineConfig;

  constructor(
    retriever: VectorRetriever,
    completion: ChatCompletionService,
    config: Partial<RAGPipelineConfig> = {}
  ) {
    this.retriever = retriever;
    this.completion = completion;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Ranked hits for the query, threshold applied, not yet budgeted
   */
  async retrieve(query: Query, signal?: AbortSignal): Promise<ScoredChunk[]> {
    return this.retriever.retrieve(query, signal);
  }

  /**
   * Answer a query with one blocking completion call
   */
  async answer(query: Query, signal?: AbortSignal): Promise<Answer> {
    const context = await this.buildContext(query, signal);
    if (context.length === 0) {
      return { status: 'no_grounded_answer', text: NO_GROUNDED_ANSWER_TEXT, citations: [], chunks: [] };
    }

    const sources = numberSources(context);
    const text = await this.completion.complete(buildChatMessages(query.question, sources), signal);

    return {
      status: 'grounded',
      text,
      citations: selectCitations(sources, text),
      chunks: context,
    };
  }

  /**
   * Answer a query as a stream of fragments.
   *
   * Retrieval completes before this resolves, so the citations (every source
   * in the context) are known up front. Fragments pass through a bounded
   * channel; cancelling it, or aborting `signal`, closes the completion stream.
   */
  async answerStream(query: Query, signal?: AbortSignal): Promise<AnswerStream> {
    const context = await this.buildContext(query, signal);
    if (context.length === 0) {
      const fragments = Channel.of(NO_GROUNDED_ANSWER_TEXT);
      return {
        status: 'no_grounded_answer',
        citations: [],
        chunks: [],
        fragments,
        cancel: (reason) => fragments.cancel(reason),
      };
    }

    const sources = numberSources(context);
    const messages = buildChatMessages(query.question, sources);
    const channel = new Channel<string>(this.config.streamBufferSize);

    const onAbort = () => channel.cancel('Request aborted');
    if (signal?.aborted) onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const produce = async (): Promise<void> => {
      for await (const fragment of this.completion.stream(messages, channel.signal)) {
        await channel.push(fragment);
      }
      channel.close();
    };

    void produce()
      .catch((error: unknown) => {
        if (channel.cancelled) return;
        console.error('[rag] Answer stream failed:', error instanceof Error ? error.message : error);
        channel.fail(error);
      })
      .finally(() => signal?.removeEventListener('abort', onAbort));

    return {
      status: 'grounded',
      citations: sources.map((source) => source.document),
      chunks: context,
      fragments: channel,
      cancel: (reason) => channel.cancel(reason),
    };
  }

  private async buildContext(query: Query, signal?: AbortSignal): Promise<ScoredChunk[]> {
    const hits = await this.retriever.retrieve(query, signal);
    if (hits.length === 0) return [];

    const budget = query.tokenBudget ?? this.config.tokenBudget;
    return fitTokenBudget(hits, budget, this.config.language);
  }
}

/**
 * Create a RAGPipeline with default configuration
 */
export function createRAGPipeline(
  retriever: VectorRetriever,
  completion: ChatCompletionService,
  config?: Partial<RAGPipelineConfig>
): RAGPipeline {
  return new RAGPipeline(retriever, completion, config);
}
