/**
 * Specialists
 *
 * Everything the supervisor can dispatch to implements `Specialist`. A
 * specialist reports failure by throwing; a `no_grounded_answer` is a
 * successful answer.
 *
 * @module @docpilot/rag/router/specialists
 */

import type { RAGPipeline } from '../pipeline';
import type { Answer, AnswerStream } from '../types';
import { keywordScore } from './classifier';

export interface SpecialistRequest {
  question: string;
  topK?: number;
  minScore?: number;
  tokenBudget?: number;
}

export interface Specialist {
  readonly tag: string;
  /** One line, shown to the model classifier */
  readonly description: string;
  /** Relevance of the question to this specialist, 0 to 1 */
  classifyRelevance(question: string): number;
  answer(request: SpecialistRequest, signal?: AbortSignal): Promise<Answer>;
  streamAnswer(request: SpecialistRequest, signal?: AbortSignal): Promise<AnswerStream>;
}

export interface RetrievalSpecialistOptions {
  tag: string;
  description: string;
  collections: string[];
  keywords: string[];
  /** Floor for the relevance score, e.g. for a catch-all specialist */
  baseRelevance?: number;
}

/**
 * Answers from a fixed set of collections through the RAG pipeline
 */
export class RetrievalSpecialist implements Specialist {
  readonly tag: string;
  readonly description: string;
  private collections: string[];
  private keywords: string[];
  private baseRelevance: number;
  private pipeline: RAGPipeline;

  constructor(options: RetrievalSpecialistOptions, pipeline: RAGPipeline) {
    this.tag = options.tag;
    this.description = options.description;
    this.collections = options.collections;
    this.keywords = options.keywords;
    this.baseRelevance = options.baseRelevance ?? 0;
    this.pipeline = pipeline;
  }

  classifyRelevance(question: string): number {
    return Math.max(this.baseRelevance, keywordScore(question, this.keywords));
  }

  answer(request: SpecialistRequest, signal?: AbortSignal): Promise<Answer> {
    return this.pipeline.answer({ ...request, collections: this.collections }, signal);
  }

  streamAnswer(request: SpecialistRequest, signal?: AbortSignal): Promise<AnswerStream> {
    return this.pipeline.answerStream({ ...request, collections: this.collections }, signal);
  }
}
