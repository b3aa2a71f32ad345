/**
 * Follow-up Store
 *
 * Durable follow-up candidates keyed by (ticketKey, commentId, mentionedUser),
 * backed by the `follow_up_candidates` table.
 *
 * @module @docpilot/tickets/follow-ups/store
 */

import {
  and,
  eq,
  postgresSchema,
  type FollowUpCandidateRow,
  type PostgresDb,
} from '@docpilot/database';
import { errorMessage } from '@docpilot/rag';
import { FollowUpStoreError } from '../errors';
import type { FollowUpCandidate, FollowUpKey } from '../types';

export interface FollowUpStore {
  list(ticketKey: string): Promise<FollowUpCandidate[]>;
  /** Keeps the existing row when the key is already recorded */
  insert(candidate: FollowUpCandidate): Promise<void>;
  remove(key: FollowUpKey): Promise<void>;
  /** False when no candidate exists for the key */
  markNotified(key: FollowUpKey, at: Date): Promise<boolean>;
}

const { followUpCandidates } = postgresSchema;

function toCandidate(row: FollowUpCandidateRow): FollowUpCandidate {
  return {
    ticketKey: row.ticketKey,
    commentId: row.commentId,
    mentionedUser: row.mentionedUser,
    commentAuthor: row.commentAuthor,
    commentCreatedAt: row.commentCreatedAt,
    firstSeenAt: row.firstSeenAt,
    notified: row.notified,
    notifiedAt: row.notifiedAt,
  };
}

function byKey(key: FollowUpKey) {
  return and(
    eq(followUpCandidates.ticketKey, key.ticketKey),
    eq(followUpCandidates.commentId, key.commentId),
    eq(followUpCandidates.mentionedUser, key.mentionedUser)
  );
}

export class PostgresFollowUpStore implements FollowUpStore {
  constructor(private readonly db: PostgresDb) {}

  async list(ticketKey: string): Promise<FollowUpCandidate[]> {
    const rows = await this.run('list', () =>
      this.db.select().from(followUpCandidates).where(eq(followUpCandidates.ticketKey, ticketKey))
    );
    return rows.map(toCandidate);
  }

  async insert(candidate: FollowUpCandidate): Promise<void> {
    await this.run('insert', () => this.db.insert(followUpCandidates).values(candidate).onConflictDoNothing());
  }

  async remove(key: FollowUpKey): Promise<void> {
    await this.run('delete', () => this.db.delete(followUpCandidates).where(byKey(key)));
  }

  async markNotified(key: FollowUpKey, at: Date): Promise<boolean> {
    const rows = await this.run('update', () =>
      this.db
        .update(followUpCandidates)
        .set({ notified: true, notifiedAt: at })
        .where(byKey(key))
        .returning({ commentId: followUpCandidates.commentId })
    );
    return rows.length > 0;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new FollowUpStoreError(`Follow-up store ${operation} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
