/**
 * Jira Specialist
 *
 * Router specialist for ticket progress questions. Questions naming a ticket
 * key are answered with the progress report of each named ticket; the answer
 * cites the tickets themselves.
 *
 * @module @docpilot/tickets/jira/specialist
 */

import {
  Channel,
  extractTicketKeys,
  keywordScore,
  type Answer,
  type AnswerStream,
  type CitedDocument,
  type Specialist,
  type SpecialistRequest,
} from '@docpilot/rag';
import type { ChangelogAnalyzer } from '../changelog/analyzer';
import { TicketTrackerError } from '../errors';
import type { TicketTracker } from '../tracker';

export interface JiraSpecialistConfig {
  tag: string;
  description: string;
  keywords: string[];
  /** Relevance when the question names a ticket key */
  ticketKeyRelevance: number;
  maxTickets: number;
}

const DEFAULT_CONFIG: JiraSpecialistConfig = {
  tag: 'jira',
  description: 'Jira ticket status, progress, cycle time and assignees',
  keywords: ['jira', 'ticket', 'issue', 'sprint', 'progress', 'status', 'assignee', 'blocked', 'cycle time'],
  ticketKeyRelevance: 0.95,
  maxTickets: 5,
};

export const NO_TICKET_TEXT = 'Name a ticket key such as ABC-123 to get its progress.';

export class JiraSpecialist implements Specialist {
  readonly tag: string;
  readonly description: string;
  private config: JiraSpecialistConfig;

  constructor(
    private readonly tracker: TicketTracker,
    private readonly analyzer: ChangelogAnalyzer,
    config: Partial<JiraSpecialistConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.tag = this.config.tag;
    this.description = this.config.description;
  }

  classifyRelevance(question: string): number {
    const keywords = keywordScore(question, this.config.keywords);
    return extractTicketKeys(question).length > 0 ? Math.max(this.config.ticketKeyRelevance, keywords) : keywords;
  }

  async answer(request: SpecialistRequest, signal?: AbortSignal): Promise<Answer> {
    const keys = extractTicketKeys(request.question).slice(0, this.config.maxTickets);
    if (keys.length === 0) {
      return { status: 'no_grounded_answer', text: NO_TICKET_TEXT, citations: [], chunks: [] };
    }

    const sections: string[] = [];
    const citations: CitedDocument[] = [];

    for (const key of keys) {
      try {
        const report = this.analyzer.analyze(await this.tracker.fetchTicket(key, signal));
        citations.push({ collection: this.tag, path: key, title: report.summary, url: this.tracker.ticketUrl(key), score: 1 });
        sections.push(`${report.summaryText} [${citations.length}]`);
      } catch (error) {
        if (!(error instanceof TicketTrackerError) || (error.kind !== 'not_found' && error.kind !== 'access_denied')) {
          throw error;
        }
        sections.push(`${key}: ${error.kind === 'not_found' ? 'ticket not found' : 'not accessible'}`);
      }
    }

    if (citations.length === 0) {
      return { status: 'no_grounded_answer', text: sections.join('\n\n'), citations: [], chunks: [] };
    }

    return { status: 'grounded', text: sections.join('\n\n'), citations, chunks: [] };
  }

  async streamAnswer(request: SpecialistRequest, signal?: AbortSignal): Promise<AnswerStream> {
    const answer = await this.answer(request, signal);
    const fragments = Channel.of(answer.text);
    return {
      status: answer.status,
      citations: answer.citations,
      chunks: answer.chunks,
      fragments,
      cancel: (reason) => fragments.cancel(reason),
    };
  }
}

export function createJiraSpecialist(
  tracker: TicketTracker,
  analyzer: ChangelogAnalyzer,
  config?: Partial<JiraSpecialistConfig>
): JiraSpecialist {
  return new JiraSpecialist(tracker, analyzer, config);
}
