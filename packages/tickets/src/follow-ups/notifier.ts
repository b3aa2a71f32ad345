/**
 * Follow-up Notifier
 *
 * Posts reminder drafts as ticket comments that mention the recipient, then
 * marks each one notified. A reminder that fails to post stays un-notified
 * and is offered again by the next scan.
 *
 * @module @docpilot/tickets/follow-ups/notifier
 */

import { AbortError } from '@docpilot/database';
import { errorMessage } from '@docpilot/rag';
import type { TicketTracker } from '../tracker';
import type { FollowUpKey, StaleFollowUp } from '../types';
import { REMINDER_MARKER, type FollowUpDetector } from './detector';

export interface NotifyResult {
  sent: Array<FollowUpKey & { trackerCommentId: string }>;
  failed: Array<FollowUpKey & { error: string }>;
}

function keyOf(followUp: StaleFollowUp): FollowUpKey {
  return { ticketKey: followUp.ticketKey, commentId: followUp.commentId, mentionedUser: followUp.mentionedUser };
}

export function formatReminderComment(followUp: StaleFollowUp): string {
  return `${REMINDER_MARKER} [~${followUp.reminder.recipient}] ${followUp.reminder.subject}\n\n${followUp.reminder.body}`;
}

export class FollowUpNotifier {
  constructor(
    private readonly tracker: TicketTracker,
    private readonly detector: FollowUpDetector,
    private readonly now: () => Date = () => new Date()
  ) {}

  async notify(followUps: StaleFollowUp[], signal?: AbortSignal): Promise<NotifyResult> {
    const result: NotifyResult = { sent: [], failed: [] };

    for (const followUp of followUps) {
      const key = keyOf(followUp);
      let posted: { id: string };
      try {
        posted = await this.tracker.postComment(followUp.ticketKey, formatReminderComment(followUp), signal);
      } catch (error) {
        if (error instanceof AbortError) throw error;
        const message = errorMessage(error);
        console.error(
          `[follow-ups] ${followUp.ticketKey}: could not remind ${followUp.mentionedUser}: ${message}`
        );
        result.failed.push({ ...key, error: message });
        continue;
      }

      if (!(await this.detector.markNotified(key, this.now()))) {
        console.warn(
          `[follow-ups] ${followUp.ticketKey}: reminder for comment ${followUp.commentId} posted after the question was cleared`
        );
      }
      result.sent.push({ ...key, trackerCommentId: posted.id });
    }

    return result;
  }
}
