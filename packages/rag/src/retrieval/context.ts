/**
 * Context window assembly
 *
 * @module @docpilot/rag/retrieval/context
 */

import { countTokens, type TokenLanguage } from '../ingestion/chunker';
import type { ScoredChunk } from '../types';

/**
 * Longest prefix of `text` within `budget` tokens, cut back to a word boundary
 * when one exists in the second half of the prefix
 */
export function truncateToTokens(text: string, budget: number, language: TokenLanguage = 'mixed'): string {
  if (budget <= 0) return '';
  if (countTokens(text, language) <= budget) return text;

  let low = 0;
  let high = text.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (countTokens(text.slice(0, mid), language) <= budget) low = mid;
    else high = mid - 1;
  }

  const prefix = text.slice(0, low);
  if (/\s/.test(text.charAt(low))) return prefix.trimEnd();

  const boundary = prefix.search(/\s\S*$/);
  return (boundary > low / 2 ? prefix.slice(0, boundary) : prefix).trimEnd();
}

/**
 * Take hits from the top until the next one would exceed `budget`. A first hit
 * that alone is too large is truncated rather than dropped.
 */
export function fitTokenBudget(
  hits: ScoredChunk[],
  budget: number,
  language: TokenLanguage = 'mixed'
): ScoredChunk[] {
  const selected: ScoredChunk[] = [];
  let used = 0;

  for (const hit of hits) {
    if (used + hit.chunk.tokenCount <= budget) {
      selected.push(hit);
      used += hit.chunk.tokenCount;
      continue;
    }

    if (selected.length === 0) {
      const text = truncateToTokens(hit.chunk.text, budget, language);
      if (text) {
        selected.push({ ...hit, chunk: { ...hit.chunk, text, tokenCount: countTokens(text, language) } });
      }
    }
    break;
  }

  return selected;
}
