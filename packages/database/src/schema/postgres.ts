import { pgTable, text, integer, timestamp, boolean, primaryKey } from 'drizzle-orm/pg-core';

// ============================================================================
// Ingestion Ledger
// ============================================================================

/**
 * One row per ingested document, keyed by (collection, path)
 */
export const ingestionRecords = pgTable(
  'ingestion_records',
  {
    collection: text('collection').notNull(),
    path: text('path').notNull(),
    contentHash: text('content_hash').notNull(),
    version: integer('version').notNull(),
    title: text('title'),
    url: text('url'),
    chunkCount: integer('chunk_count').default(0).notNull(),
    lastSuccessAt: timestamp('last_success_at', { withTimezone: true }),
    lastAttemptAt: timestamp('last_attempt_at', { withTimezone: true }).defaultNow().notNull(),
    lastError: text('last_error'),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.collection, table.path] }),
  })
);

// ============================================================================
// Follow-up Tracking
// ============================================================================

/**
 * Unanswered mentions found in ticket comment threads. The notified flag survives
 * restarts so a reminder is only ever sent once per (ticket, comment, user).
 */
export const followUpCandidates = pgTable(
  'follow_up_candidates',
  {
    ticketKey: text('ticket_key').notNull(),
    commentId: text('comment_id').notNull(),
    mentionedUser: text('mentioned_user').notNull(),
    commentAuthor: text('comment_author').notNull(),
    commentCreatedAt: timestamp('comment_created_at', { withTimezone: true }).notNull(),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).defaultNow().notNull(),
    notified: boolean('notified').default(false).notNull(),
    notifiedAt: timestamp('notified_at', { withTimezone: true }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.ticketKey, table.commentId, table.mentionedUser] }),
  })
);

export type IngestionRecordRow = typeof ingestionRecords.$inferSelect;
export type FollowUpCandidateRow = typeof followUpCandidates.$inferSelect;
