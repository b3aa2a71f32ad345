/**
 * Citation Numbering and Extraction
 *
 * Context chunks are grouped per document; each document gets one source
 * number in order of its best chunk. Answers cite sources as [1], [2], ...
 *
 * @module @docpilot/rag/generation/citations
 */

import type { CitedDocument, ScoredChunk } from '../types';

export interface ContextSource {
  /** 1-based number used in [n] markers */
  number: number;
  document: CitedDocument;
  chunks: ScoredChunk[];
}

export function documentKey(collection: string, path: string): string {
  return `${collection}\u0000${path}`;
}

/**
 * Group ranked context chunks into numbered sources. Input order (best first)
 * decides numbering; chunks inside a source keep their document order.
 */
export function numberSources(context: ScoredChunk[]): ContextSource[] {
  const sources = new Map<string, ContextSource>();

  for (const hit of context) {
    const key = documentKey(hit.chunk.collection, hit.chunk.path);
    let source = sources.get(key);
    if (!source) {
      source = {
        number: sources.size + 1,
        document: {
          collection: hit.chunk.collection,
          path: hit.chunk.path,
          title: hit.chunk.title,
          url: hit.chunk.url,
          score: hit.score,
        },
        chunks: [],
      };
      sources.set(key, source);
    }
    source.chunks.push(hit);
  }

  for (const source of sources.values()) {
    source.chunks.sort((a, b) => a.chunk.chunkIndex - b.chunk.chunkIndex);
  }
  return [...sources.values()];
}

/**
 * Distinct [n] markers in order of first appearance
 */
export function extractCitationNumbers(text: string): number[] {
  const seen = new Set<number>();
  for (const match of text.matchAll(/\[(\d+)\]/g)) {
    seen.add(Number(match[1]));
  }
  return [...seen];
}

/**
 * Documents the answer cites, in source order. An answer without any valid
 * marker cites every source it was given.
 */
export function selectCitations(sources: ContextSource[], answer: string): CitedDocument[] {
  const used = new Set(extractCitationNumbers(answer));
  const cited = sources.filter((source) => used.has(source.number));
  return (cited.length > 0 ? cited : sources).map((source) => source.document);
}
