/**
 * Query Classification
 *
 * Scores every specialist for a question. The heuristic classifier asks the
 * specialists themselves (keyword and ticket-key rules); the model classifier
 * asks the chat completion service and validates its JSON reply.
 *
 * @module @docpilot/rag/router/classifier
 */

import { z } from 'zod';
import type { ChatCompletionService } from '../generation/llm';
import { buildClassificationMessages } from '../generation/prompts';
import { errorMessage } from '../errors';
import type { Specialist } from './specialists';

export interface SpecialistScore {
  tag: string;
  score: number;
}

export interface QueryClassifier {
  classify(question: string, specialists: readonly Specialist[], signal?: AbortSignal): Promise<SpecialistScore[]>;
}

// ============================================================================
// Heuristics
// ============================================================================

/** Jira-style issue key, e.g. OPS-1234 */
export const TICKET_KEY_PATTERN = /\b[A-Z][A-Z0-9]+-\d+\b/g;

export function extractTicketKeys(text: string): string[] {
  return [...new Set(text.match(TICKET_KEY_PATTERN) ?? [])];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 1 - 0.5^n for n distinct keywords found (whole words, case-insensitive)
 */
export function keywordScore(question: string, keywords: readonly string[]): number {
  const text = question.toLowerCase();
  const matches = new Set(
    keywords
      .map((keyword) => keyword.toLowerCase())
      .filter((keyword) => new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(keyword)}($|[^\\p{L}\\p{N}])`, 'u').test(text))
  ).size;

  return matches === 0 ? 0 : 1 - 0.5 ** matches;
}

/**
 * Scores in descending order; equal scores keep specialist registration order
 */
export function rankScores(scores: SpecialistScore[], specialists: readonly Specialist[]): SpecialistScore[] {
  const order = new Map(specialists.map((s, i) => [s.tag, i]));
  return [...scores].sort(
    (a, b) => b.score - a.score || (order.get(a.tag) ?? Infinity) - (order.get(b.tag) ?? Infinity)
  );
}

function clampScore(score: number): number {
  return Number.isFinite(score) ? Math.min(1, Math.max(0, score)) : 0;
}

export class HeuristicClassifier implements QueryClassifier {
  async classify(question: string, specialists: readonly Specialist[]): Promise<SpecialistScore[]> {
    const scores = specialists.map((s) => ({ tag: s.tag, score: clampScore(s.classifyRelevance(question)) }));
    return rankScores(scores, specialists);
  }
}

// ============================================================================
// Model-based
// ============================================================================

const classificationSchema = z.object({
  scores: z.record(z.string(), z.coerce.number().min(0).max(1)),
});

/**
 * Pull the JSON object out of a model reply (plain, or inside a code fence)
 */
export function parseClassificationReply(reply: string): Record<string, number> | null {
  const fenced = reply.match(/```(?:json)?\s*([\s\S]*?)```/);
  const candidate = (fenced ? fenced[1] : reply).trim();
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start < 0 || end <= start) return null;

  try {
    const parsed = classificationSchema.safeParse(JSON.parse(candidate.slice(start, end + 1)));
    return parsed.success ? parsed.data.scores : null;
  } catch {
    return null;
  }
}

export class ModelClassifier implements QueryClassifier {
  private completion: ChatCompletionService;
  private fallback: QueryClassifier;

  constructor(completion: ChatCompletionService, fallback: QueryClassifier = new HeuristicClassifier()) {
    this.completion = completion;
    this.fallback = fallback;
  }

  async classify(
    question: string,
    specialists: readonly Specialist[],
    signal?: AbortSignal
  ): Promise<SpecialistScore[]> {
    let reply: string;
    try {
      reply = await this.completion.complete(buildClassificationMessages(question, specialists), signal);
    } catch (error) {
      console.warn(`[router] Model classification failed, using heuristics: ${errorMessage(error)}`);
      return this.fallback.classify(question, specialists, signal);
    }

    const scores = parseClassificationReply(reply);
    if (!scores) {
      console.warn('[router] Model classification reply was not valid JSON scores, using heuristics');
      return this.fallback.classify(question, specialists, signal);
    }

    return rankScores(
      specialists.map((s) => ({ tag: s.tag, score: clampScore(scores[s.tag] ?? 0) })),
      specialists
    );
  }
}
