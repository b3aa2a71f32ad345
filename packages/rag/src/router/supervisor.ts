/**
 * Supervisor Router
 *
 * Classifies a question, dispatches it to one specialist (single mode) or to
 * every specialist above the confidence threshold (multi mode), and merges
 * the answers. Each step is a transition of a `RouterStateMachine`.
 *
 * A failed specialist is retried once, then the `general` fallback is tried
 * when configured. When nothing succeeds the outcome is `failed`, never an
 * empty answer. Low or tied classification scores end in a clarification
 * request listing the candidate specialists.
 *
 * Merged answers are ordered grounded first, then by classification
 * confidence, then by specialist registration order. Citations are
 * de-duplicated by (collection, path), first occurrence kept.
 *
 * @module @docpilot/rag/router/supervisor
 */

import { AbortError } from '@docpilot/database';
import { documentKey } from '../generation/citations';
import { Channel } from '../generation/streaming';
import { errorMessage } from '../errors';
import type { Answer, AnswerStatus, AnswerStream, CitedDocument } from '../types';
import { HeuristicClassifier, type QueryClassifier, type SpecialistScore } from './classifier';
import type { Specialist, SpecialistRequest } from './specialists';
import { RouterStateMachine, type RouterState } from './state-machine';

// ============================================================================
// Types
// ============================================================================

export type RouteMode = 'single' | 'multi';

export interface SupervisorConfig {
  /** Minimum classification score for a specialist to be dispatched */
  confidenceThreshold: number;
  /** Single mode: a runner-up this close to the winner makes the route ambiguous */
  tieMargin: number;
  mode: RouteMode;
  /** Specialist tried after the chosen ones failed; null disables the fallback */
  fallbackTag: string | null;
}

const DEFAULT_CONFIG: SupervisorConfig = {
  confidenceThreshold: 0.5,
  tieMargin: 0.05,
  mode: 'single',
  fallbackTag: 'general',
};

// score comparisons tolerate float noise, so 0.75 - 0.7 counts as within 0.05
const EPSILON = 1e-9;

export interface RouteRequest extends SpecialistRequest {
  /** Skip classification and dispatch to this specialist */
  specialist?: string;
  mode?: RouteMode;
}

export interface RouteOptions {
  signal?: AbortSignal;
  /** Continue an existing machine, e.g. after a clarification */
  machine?: RouterStateMachine;
}

export interface SpecialistResult {
  tag: string;
  confidence: number;
  status: AnswerStatus;
  attempts: number;
  fallback: boolean;
}

export interface SpecialistFailure {
  tag: string;
  message: string;
  attempts: number;
}

export type ClarificationReason = 'low_confidence' | 'ambiguous' | 'unknown_specialist';

export interface ClarificationOutcome {
  kind: 'clarification';
  reason: ClarificationReason;
  message: string;
  candidates: SpecialistScore[];
  history: RouterState[];
}

export interface FailedOutcome {
  kind: 'failed';
  message: string;
  failures: SpecialistFailure[];
  history: RouterState[];
}

export interface AnswerOutcome {
  kind: 'answer';
  mode: RouteMode;
  answer: Answer;
  /** In merge order */
  specialists: SpecialistResult[];
  failures: SpecialistFailure[];
  history: RouterState[];
}

export interface StreamOutcome {
  kind: 'stream';
  mode: RouteMode;
  specialists: string[];
  stream: AnswerStream;
  history: RouterState[];
}

export type RouteOutcome = AnswerOutcome | ClarificationOutcome | FailedOutcome;
export type RouteStreamOutcome = StreamOutcome | ClarificationOutcome | FailedOutcome;

interface Candidate {
  specialist: Specialist;
  confidence: number;
}

type Selection = { kind: 'selected'; candidates: Candidate[]; scores: SpecialistScore[] } | ClarificationOutcome;

type Attempt<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; message: string; attempts: number };

interface SpecialistAnswer {
  tag: string;
  confidence: number;
  answer: Answer;
}

// ============================================================================
// Synthesis
// ============================================================================

/**
 * First occurrence of each (collection, path) wins
 */
export function dedupeCitations(citations: CitedDocument[]): CitedDocument[] {
  const seen = new Set<string>();
  return citations.filter((citation) => {
    const key = documentKey(citation.collection, citation.path);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Grounded first, then confidence (desc), then tag order
 */
export function orderAnswers(results: SpecialistAnswer[], tagOrder: readonly string[]): SpecialistAnswer[] {
  const rank = (tag: string) => {
    const index = tagOrder.indexOf(tag);
    return index < 0 ? Infinity : index;
  };
  const grounded = (r: SpecialistAnswer) => (r.answer.status === 'grounded' ? 0 : 1);

  return [...results].sort(
    (a, b) => grounded(a) - grounded(b) || b.confidence - a.confidence || rank(a.tag) - rank(b.tag)
  );
}

/**
 * Combine ordered specialist answers into one. Each grounded answer keeps its
 * own [n] numbering under a heading with its tag.
 */
export function mergeAnswers(ordered: SpecialistAnswer[]): Answer {
  if (ordered.length === 0) {
    throw new Error('Cannot merge an empty set of answers');
  }
  if (ordered.length === 1) {
    return ordered[0].answer;
  }

  const grounded = ordered.filter((r) => r.answer.status === 'grounded');
  if (grounded.length === 0) {
    return { ...ordered[0].answer, citations: [], chunks: [] };
  }

  const text =
    grounded.length === 1
      ? grounded[0].answer.text
      : grounded.map((r) => `**${r.tag}**\n${r.answer.text}`).join('\n\n');

  return {
    status: 'grounded',
    text,
    citations: dedupeCitations(grounded.flatMap((r) => r.answer.citations)),
    chunks: grounded.flatMap((r) => r.answer.chunks),
  };
}

// ============================================================================
// Supervisor
// ============================================================================

export class SupervisorRouter {
  private specialists: Specialist[];
  private classifier: QueryClassifier;
  private config: SupervisorConfig;

  constructor(
    specialists: Specialist[],
    classifier: QueryClassifier = new HeuristicClassifier(),
    config: Partial<SupervisorConfig> = {}
  ) {
    const tags = new Set<string>();
    for (const specialist of specialists) {
      if (tags.has(specialist.tag)) throw new Error(`Duplicate specialist tag: ${specialist.tag}`);
      tags.add(specialist.tag);
    }

    this.specialists = specialists;
    this.classifier = classifier;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get tags(): string[] {
    return this.specialists.map((s) => s.tag);
  }

  async route(request: RouteRequest, options: RouteOptions = {}): Promise<RouteOutcome> {
    const { signal } = options;
    const machine = options.machine ?? new RouterStateMachine();
    const mode = request.mode ?? this.config.mode;

    const selection = await this.select(request, mode, machine, signal);
    if (selection.kind === 'clarification') return selection;

    machine.transition('dispatched');
    const attempts = await Promise.all(
      selection.candidates.map(async (candidate) => ({
        candidate,
        result: await this.attempt(
          candidate.specialist.tag,
          () => candidate.specialist.answer(this.specialistRequest(request), signal),
          signal
        ),
      }))
    );

    const answers: SpecialistAnswer[] = [];
    const results = new Map<string, SpecialistResult>();
    const failures: SpecialistFailure[] = [];

    for (const { candidate, result } of attempts) {
      const tag = candidate.specialist.tag;
      if (result.ok) {
        answers.push({ tag, confidence: candidate.confidence, answer: result.value });
        results.set(tag, {
          tag,
          confidence: candidate.confidence,
          status: result.value.status,
          attempts: result.attempts,
          fallback: false,
        });
      } else {
        failures.push({ tag, message: result.message, attempts: result.attempts });
      }
    }

    if (answers.length === 0) {
      machine.transition('specialist_failed');

      const fallback = this.fallbackFor(selection.candidates);
      if (fallback) {
        machine.transition('dispatched');
        const confidence = selection.scores.find((s) => s.tag === fallback.tag)?.score ?? 0;
        const result = await this.attempt(
          fallback.tag,
          () => fallback.answer(this.specialistRequest(request), signal),
          signal
        );

        if (result.ok) {
          answers.push({ tag: fallback.tag, confidence, answer: result.value });
          results.set(fallback.tag, {
            tag: fallback.tag,
            confidence,
            status: result.value.status,
            attempts: result.attempts,
            fallback: true,
          });
        } else {
          failures.push({ tag: fallback.tag, message: result.message, attempts: result.attempts });
          machine.transition('specialist_failed');
        }
      }

      if (answers.length === 0) {
        return this.fail(machine, failures);
      }
    }

    machine.transition('specialist_succeeded');
    const ordered = orderAnswers(answers, this.tags);
    const answer = mergeAnswers(ordered);
    machine.transition('synthesized');
    machine.transition('responded');

    console.log(
      `[router] Answered by ${ordered.map((r) => r.tag).join(', ')} (${answer.status}, ${answer.citations.length} citations)`
    );

    return {
      kind: 'answer',
      mode,
      answer,
      specialists: ordered.flatMap((r) => results.get(r.tag) ?? []),
      failures,
      history: machine.history,
    };
  }

  /**
   * Streaming variant. Single mode streams the chosen specialist's fragments;
   * multi mode merges blocking answers and delivers the merged text as one
   * fragment.
   */
  async routeStream(request: RouteRequest, options: RouteOptions = {}): Promise<RouteStreamOutcome> {
    const mode = request.mode ?? this.config.mode;

    if (mode === 'multi') {
      const outcome = await this.route(request, options);
      if (outcome.kind !== 'answer') return outcome;

      const fragments = Channel.of(outcome.answer.text);
      return {
        kind: 'stream',
        mode,
        specialists: outcome.specialists.map((s) => s.tag),
        stream: {
          status: outcome.answer.status,
          citations: outcome.answer.citations,
          chunks: outcome.answer.chunks,
          fragments,
          cancel: (reason) => fragments.cancel(reason),
        },
        history: outcome.history,
      };
    }

    const { signal } = options;
    const machine = options.machine ?? new RouterStateMachine();
    const selection = await this.select(request, mode, machine, signal);
    if (selection.kind === 'clarification') return selection;

    const failures: SpecialistFailure[] = [];
    const chain = [selection.candidates[0].specialist];
    const fallback = this.fallbackFor(selection.candidates);
    if (fallback) chain.push(fallback);

    for (const specialist of chain) {
      machine.transition('dispatched');
      const result = await this.attempt(
        specialist.tag,
        () => specialist.streamAnswer(this.specialistRequest(request), signal),
        signal
      );

      if (result.ok) {
        machine.transition('specialist_succeeded');
        machine.transition('synthesized');
        machine.transition('responded');
        return { kind: 'stream', mode, specialists: [specialist.tag], stream: result.value, history: machine.history };
      }

      failures.push({ tag: specialist.tag, message: result.message, attempts: result.attempts });
      machine.transition('specialist_failed');
    }

    return this.fail(machine, failures);
  }

  /**
   * Answer a clarification: restart the same machine with the chosen specialist
   */
  resume(
    clarification: ClarificationOutcome,
    request: RouteRequest,
    specialist: string,
    signal?: AbortSignal
  ): Promise<RouteOutcome> {
    const machine = new RouterStateMachine(clarification.history);
    machine.transition('received');
    return this.route({ ...request, specialist }, { signal, machine });
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async select(
    request: RouteRequest,
    mode: RouteMode,
    machine: RouterStateMachine,
    signal?: AbortSignal
  ): Promise<Selection> {
    if (request.specialist) {
      machine.transition('classified');
      const specialist = this.specialists.find((s) => s.tag === request.specialist);
      if (!specialist) {
        return this.clarify(
          machine,
          'unknown_specialist',
          this.specialists.map((s) => ({ tag: s.tag, score: 0 }))
        );
      }
      return { kind: 'selected', candidates: [{ specialist, confidence: 1 }], scores: [] };
    }

    const scores = await this.classifier.classify(request.question, this.specialists, signal);
    machine.transition('classified');
    console.log(`[router] Scores: ${scores.map((s) => `${s.tag}=${s.score.toFixed(2)}`).join(' ')}`);

    const { confidenceThreshold, tieMargin } = this.config;
    const top = scores[0];
    if (!top || top.score < confidenceThreshold) {
      return this.clarify(machine, 'low_confidence', scores.slice(0, 3));
    }

    if (mode === 'single') {
      const tied = scores.filter((s) => top.score - s.score <= tieMargin + EPSILON);
      if (tied.length > 1) {
        return this.clarify(machine, 'ambiguous', tied);
      }
      return { kind: 'selected', candidates: this.toCandidates([top]), scores };
    }

    return {
      kind: 'selected',
      candidates: this.toCandidates(scores.filter((s) => s.score >= confidenceThreshold)),
      scores,
    };
  }

  private async attempt<T>(tag: string, op: () => Promise<T>, signal?: AbortSignal): Promise<Attempt<T>> {
    let message = '';
    for (let attempt = 1; attempt <= 2; attempt++) {
      if (signal?.aborted) throw new AbortError();
      try {
        return { ok: true, value: await op(), attempts: attempt };
      } catch (error) {
        if (signal?.aborted) throw error;
        message = errorMessage(error);
        console.warn(`[router] Specialist ${tag} failed (attempt ${attempt}/2): ${message}`);
      }
    }
    return { ok: false, message, attempts: 2 };
  }

  private fallbackFor(tried: Candidate[]): Specialist | null {
    const tag = this.config.fallbackTag;
    if (!tag || tried.some((c) => c.specialist.tag === tag)) return null;
    return this.specialists.find((s) => s.tag === tag) ?? null;
  }

  private toCandidates(scores: SpecialistScore[]): Candidate[] {
    return scores.flatMap((score) => {
      const specialist = this.specialists.find((s) => s.tag === score.tag);
      return specialist ? [{ specialist, confidence: score.score }] : [];
    });
  }

  private specialistRequest(request: RouteRequest): SpecialistRequest {
    return {
      question: request.question,
      topK: request.topK,
      minScore: request.minScore,
      tokenBudget: request.tokenBudget,
    };
  }

  private clarify(
    machine: RouterStateMachine,
    reason: ClarificationReason,
    candidates: SpecialistScore[]
  ): ClarificationOutcome {
    machine.transition('clarification_requested');
    machine.transition('awaiting_user');

    const tags = candidates.map((c) => c.tag).join(', ');
    const message =
      reason === 'ambiguous'
        ? `This question fits more than one source (${tags}). Which one should I use?`
        : reason === 'unknown_specialist'
          ? `Unknown source. Choose one of: ${tags}.`
          : `I'm not sure which source covers this. Did you mean one of: ${tags}?`;

    console.log(`[router] Clarification requested (${reason}): ${tags}`);
    return { kind: 'clarification', reason, message, candidates, history: machine.history };
  }

  private fail(machine: RouterStateMachine, failures: SpecialistFailure[]): FailedOutcome {
    machine.transition('responded');
    const message = `No specialist could answer: ${failures.map((f) => `${f.tag}: ${f.message}`).join('; ')}`;
    console.error(`[router] ${message}`);
    return { kind: 'failed', message, failures, history: machine.history };
  }
}

export function createSupervisor(
  specialists: Specialist[],
  classifier?: QueryClassifier,
  config?: Partial<SupervisorConfig>
): SupervisorRouter {
  return new SupervisorRouter(specialists, classifier, config);
}
