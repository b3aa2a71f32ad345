/**
 * RAG Pipeline Tests
 *
 * Blocking and streamed answers over an in-memory store.
 *
 * @module @docpilot/rag/tests/unit/rag-pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { NO_GROUNDED_ANSWER_TEXT } from '../../src/generation/prompts';
import { RAGPipeline } from '../../src/pipeline';
import { VectorRetriever } from '../../src/retrieval/vector';
import type { Query } from '../../src/types';
import { FakeCompletionService, FakeEmbeddingService, InMemoryVectorStore, embedded } from '../support/fakes';

// ============================================================================
// Fixtures
// ============================================================================

function at(score: number): number[] {
  return [score, Math.sqrt(1 - score * score)];
}

const QUERY: Query = { question: 'deployment steps', collections: ['ops'] };

function setup(reply?: string) {
  const store = new InMemoryVectorStore();
  const embeddings = new FakeEmbeddingService();
  embeddings.vectors.set('deployment steps', [1, 0]);
  const completion = new FakeCompletionService(reply);

  for (const chunk of [
    embedded({
      collection: 'ops',
      path: 'deploy.md',
      title: 'Deploy guide',
      text: 'Run scripts/release.sh from the main branch.',
      embedding: at(0.9),
    }),
    embedded({ collection: 'ops', path: 'faq.md', text: 'Deploys happen on Tuesdays.', embedding: at(0.7) }),
  ]) {
    store.chunks.set(chunk.id, chunk);
  }

  const pipeline = new RAGPipeline(new VectorRetriever(embeddings, store, { minScore: 0.5 }), completion, {
    streamBufferSize: 1,
  });
  return { pipeline, store, completion };
}

async function collect(fragments: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const fragment of fragments) out.push(fragment);
  return out;
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// Blocking
// ============================================================================

describe('RAGPipeline.answer', () => {
  it('should answer from numbered sources and cite the referenced ones', async () => {
    const { pipeline, completion } = setup('Run the release script [1].');

    const answer = await pipeline.answer(QUERY);

    expect(answer.status).toBe('grounded');
    expect(answer.text).toBe('Run the release script [1].');
    expect(answer.citations.map((c) => c.path)).toEqual(['deploy.md']);
    expect(answer.chunks.map((h) => h.chunk.path)).toEqual(['deploy.md', 'faq.md']);

    const prompt = completion.calls[0][1].content;
    expect(prompt).toContain('[1] Source: Deploy guide (deploy.md)\nRun scripts/release.sh from the main branch.\n---');
    expect(prompt).toContain('[2] Source: faq.md\nDeploys happen on Tuesdays.\n---');
  });

  it('should cite every source when the answer has no markers', async () => {
    const { pipeline } = setup('Use the release script.');

    const answer = await pipeline.answer(QUERY);

    expect(answer.citations.map((c) => c.path)).toEqual(['deploy.md', 'faq.md']);
  });

  it('should return no grounded answer without calling the model when nothing matches', async () => {
    const { pipeline, completion } = setup();

    const answer = await pipeline.answer({ ...QUERY, minScore: 0.95 });

    expect(answer).toEqual({ status: 'no_grounded_answer', text: NO_GROUNDED_ANSWER_TEXT, citations: [], chunks: [] });
    expect(completion.calls).toHaveLength(0);
  });

  it('should keep the context within the token budget', async () => {
    const { pipeline } = setup();

    const answer = await pipeline.answer({ ...QUERY, tokenBudget: 10 });

    expect(answer.chunks.map((h) => h.chunk.path)).toEqual(['deploy.md']);
  });
});

// ============================================================================
// Streaming
// ============================================================================

describe('RAGPipeline.answerStream', () => {
  it('should expose citations up front and stream the answer fragments', async () => {
    const { pipeline } = setup('Deploy with the release script [1].');

    const stream = await pipeline.answerStream(QUERY);

    expect(stream.status).toBe('grounded');
    expect(stream.citations.map((c) => c.path)).toEqual(['deploy.md', 'faq.md']);
    expect(await collect(stream.fragments)).toEqual(['Deploy ', 'with ', 'the ', 'release ', 'script ', '[1].']);
  });

  it('should close the completion stream when the consumer stops early', async () => {
    const { pipeline, completion } = setup('one two three four five six seven eight nine ten');

    const stream = await pipeline.answerStream(QUERY);
    for await (const fragment of stream.fragments) {
      expect(fragment).toBe('one ');
      break;
    }

    await vi.waitFor(() => expect(completion.streamClosed).toBe(true));
    expect(completion.emitted).toBeLessThan(10);
  });

  it('should close the completion stream when the request signal aborts', async () => {
    const { pipeline, completion } = setup('one two three four five six seven eight nine ten');
    const controller = new AbortController();

    const stream = await pipeline.answerStream(QUERY, controller.signal);
    controller.abort();

    expect(await collect(stream.fragments)).toEqual([]);
    await vi.waitFor(() => expect(completion.streamClosed).toBe(true));
  });

  it('should surface a completion failure to the consumer', async () => {
    const { pipeline, completion } = setup();
    completion.failures.push(new Error('upstream down'));

    const stream = await pipeline.answerStream(QUERY);

    await expect(collect(stream.fragments)).rejects.toThrow('upstream down');
  });

  it('should stream the no grounded answer text without calling the model', async () => {
    const { pipeline, completion } = setup();

    const stream = await pipeline.answerStream({ ...QUERY, collections: ['empty'] });

    expect(stream.status).toBe('no_grounded_answer');
    expect(await collect(stream.fragments)).toEqual([NO_GROUNDED_ANSWER_TEXT]);
    expect(completion.calls).toHaveLength(0);
  });
});
