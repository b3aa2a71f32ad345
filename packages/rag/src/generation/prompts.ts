/**
 * Prompt Templates for Grounded Response Generation
 *
 * @module @docpilot/rag/generation/prompts
 */

import type { ChatMessage } from '../types';
import type { ContextSource } from './citations';

/**
 * Returned instead of a model answer when retrieval finds nothing usable
 */
export const NO_GROUNDED_ANSWER_TEXT =
  "I couldn't find anything in the indexed documentation that answers this question.";

/**
 * Format numbered sources for the prompt
 */
export function formatContext(sources: ContextSource[]): string {
  return sources
    .map((source) => {
      const { document } = source;
      const label = document.title ? `${document.title} (${document.path})` : document.path;
      const body = source.chunks.map((hit) => hit.chunk.text).join('\n\n');
      return `[${source.number}] Source: ${label}\n${body}\n---`;
    })
    .join('\n\n');
}

export const GROUNDED_RESPONSE_SYSTEM_PROMPT = `You are an assistant that answers questions about an organization's internal documentation.

Your responses MUST be:
1. GROUNDED in the provided sources - only use information from them
2. CITED - reference sources as [1], [2], etc. right after the statement they support
3. ACCURATE - never add facts that are not in the sources

If the sources do not contain the answer, say so plainly instead of guessing.`;

export function createQueryPrompt(question: string, context: string): string {
  return `Answer the question using only the sources below.

## Sources
${context}

## Question
${question}

## Instructions
- Cite sources using [1], [2], etc. after each relevant statement
- If several sources support a point, cite them all [1][2]
- Be thorough but concise
- If the sources only partly answer the question, say what is missing`;
}

export function buildChatMessages(question: string, sources: ContextSource[]): ChatMessage[] {
  return [
    { role: 'system', content: GROUNDED_RESPONSE_SYSTEM_PROMPT },
    { role: 'user', content: createQueryPrompt(question, formatContext(sources)) },
  ];
}

/**
 * Prompt for the model-based router classifier. The model must reply with JSON
 * only: {"scores": {"<tag>": <0..1>, ...}}.
 */
export function buildClassificationMessages(
  question: string,
  specialists: ReadonlyArray<{ tag: string; description: string }>
): ChatMessage[] {
  const catalogue = specialists.map((s) => `- ${s.tag}: ${s.description}`).join('\n');

  return [
    {
      role: 'system',
      content: `You route user questions to specialists. Rate how well each specialist fits the question with a number between 0 and 1.

Specialists:
${catalogue}

Reply with JSON only, in the form {"scores": {"<tag>": <number>}}. Include every specialist.`,
    },
    { role: 'user', content: question },
  ];
}
