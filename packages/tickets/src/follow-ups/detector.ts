/**
 * Follow-up Detector
 *
 * Finds comments that ask a mentioned user something and never got an
 * answer. A question is a comment with an interrogative marker that mentions
 * at least one user other than its author; it is answered, per mentioned
 * user, once that user comments later in the thread, or once the question or
 * any later comment is marked resolved.
 *
 * Reminders this module posts start with `REMINDER_MARKER` and are never
 * questions themselves, although they mention the recipient and quote the
 * original question.
 *
 * Each scan reconciles the store with the thread: new open questions are
 * recorded, answered or deleted ones are cleared, and recorded questions
 * older than the staleness window that were never notified are returned with
 * a reminder draft.
 *
 * @module @docpilot/tickets/follow-ups/detector
 */

import { KeyedMutex } from '@docpilot/rag';
import { formatDuration } from '../changelog/summary';
import type { Comment, FollowUpCandidate, FollowUpKey, ReminderDraft, StaleFollowUp, Ticket } from '../types';
import type { FollowUpStore } from './store';

export interface FollowUpDetectorConfig {
  stalenessWindowMs: number;
  questionPattern: RegExp;
  excerptLength: number;
}

export const DEFAULT_QUESTION_PATTERN =
  /[?？]|\b(?:can|could|would) you\b|\bplease (?:advise|confirm|check|review|update|let me know)\b|\bany (?:update|news|progress)\b/i;

const DEFAULT_CONFIG: FollowUpDetectorConfig = {
  stalenessWindowMs: 48 * 60 * 60 * 1000,
  questionPattern: DEFAULT_QUESTION_PATTERN,
  excerptLength: 200,
};

export interface OpenQuestion {
  comment: Comment;
  mentionedUser: string;
}

export const REMINDER_MARKER = '[docpilot-reminder]';

const MENTION_MARKUP = /\[~(?:accountid:)?([^\]]+)\]/g;

function sameUser(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function candidateId(key: FollowUpKey): string {
  return `${key.ticketKey}/${key.commentId}/${key.mentionedUser.toLowerCase()}`;
}

export function excerpt(body: string, maxLength: number): string {
  const text = body.replace(MENTION_MARKUP, '@$1').replace(/\s+/g, ' ').trim();
  return text.length > maxLength ? `${text.slice(0, maxLength - 3).trimEnd()}...` : text;
}

export class FollowUpDetector {
  private config: FollowUpDetectorConfig;
  private store: FollowUpStore;
  private mutex = new KeyedMutex();

  constructor(store: FollowUpStore, config: Partial<FollowUpDetectorConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isQuestion(comment: Comment): boolean {
    return (
      !comment.body.trimStart().startsWith(REMINDER_MARKER) &&
      this.config.questionPattern.test(comment.body) &&
      comment.mentions.some((user) => !sameUser(user, comment.author))
    );
  }

  /**
   * Unanswered (comment, mentioned user) pairs in thread order
   */
  openQuestions(ticket: Ticket): OpenQuestion[] {
    const thread = ticket.comments
      .map((comment, index) => ({ comment, index }))
      .sort((a, b) => a.comment.createdAt.getTime() - b.comment.createdAt.getTime() || a.index - b.index)
      .map(({ comment }) => comment);

    const open: OpenQuestion[] = [];
    thread.forEach((comment, position) => {
      if (comment.resolved || !this.isQuestion(comment)) return;

      const later = thread.slice(position + 1);
      if (later.some((reply) => reply.resolved)) return;

      const users = new Map<string, string>();
      for (const user of comment.mentions) {
        if (!sameUser(user, comment.author)) users.set(user.toLowerCase(), user);
      }

      for (const user of users.values()) {
        if (!later.some((reply) => sameUser(reply.author, user))) {
          open.push({ comment, mentionedUser: user });
        }
      }
    });
    return open;
  }

  async scan(
    ticket: Ticket,
    stalenessWindowMs = this.config.stalenessWindowMs,
    now: Date = new Date()
  ): Promise<StaleFollowUp[]> {
    return this.mutex.runExclusive(ticket.key, async () => {
      const open = new Map(
        this.openQuestions(ticket).map((q) => [
          candidateId({ ticketKey: ticket.key, commentId: q.comment.id, mentionedUser: q.mentionedUser }),
          q,
        ])
      );

      const recorded = new Map<string, FollowUpCandidate>();
      let cleared = 0;
      for (const candidate of await this.store.list(ticket.key)) {
        const id = candidateId(candidate);
        if (open.has(id)) {
          recorded.set(id, candidate);
        } else {
          await this.store.remove(candidate);
          cleared++;
        }
      }

      for (const [id, question] of open) {
        if (recorded.has(id)) continue;
        const candidate: FollowUpCandidate = {
          ticketKey: ticket.key,
          commentId: question.comment.id,
          mentionedUser: question.mentionedUser,
          commentAuthor: question.comment.author,
          commentCreatedAt: question.comment.createdAt,
          firstSeenAt: now,
          notified: false,
          notifiedAt: null,
        };
        await this.store.insert(candidate);
        recorded.set(id, candidate);
      }

      const stale: StaleFollowUp[] = [];
      for (const [id, candidate] of recorded) {
        const question = open.get(id);
        const age = now.getTime() - candidate.commentCreatedAt.getTime();
        if (!question || candidate.notified || age < stalenessWindowMs) continue;
        stale.push({ ...candidate, reminder: this.buildReminder(ticket, question, now) });
      }

      console.log(
        `[follow-ups] ${ticket.key}: ${open.size} open, ${cleared} cleared, ${stale.length} awaiting a reminder`
      );
      return stale;
    });
  }

  markNotified(key: FollowUpKey, at: Date = new Date()): Promise<boolean> {
    return this.mutex.runExclusive(key.ticketKey, () => this.store.markNotified(key, at));
  }

  buildReminder(ticket: Ticket, question: OpenQuestion, now: Date): ReminderDraft {
    const { comment, mentionedUser } = question;
    const age = formatDuration(now.getTime() - comment.createdAt.getTime());

    return {
      recipient: mentionedUser,
      subject: `[${ticket.key}] ${comment.author} is waiting on your reply`,
      body: [
        `Hi ${mentionedUser},`,
        '',
        `${comment.author} asked you a question on ${ticket.key} (${ticket.summary}) ${age} ago:`,
        '',
        `> ${excerpt(comment.body, this.config.excerptLength)}`,
        '',
        'Please reply on the ticket, or mark the question resolved if it no longer applies.',
      ].join('\n'),
    };
  }
}

export function createFollowUpDetector(
  store: FollowUpStore,
  config?: Partial<FollowUpDetectorConfig>
): FollowUpDetector {
  return new FollowUpDetector(store, config);
}
