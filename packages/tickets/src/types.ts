/**
 * Ticket Types
 *
 * Tracker-neutral shapes for tickets, their status changelog and comment
 * threads, plus the reports derived from them.
 *
 * @module @docpilot/tickets/types
 */

// ============================================================================
// Tracker data
// ============================================================================

export interface ChangelogEntry {
  fromStatus: string;
  toStatus: string;
  timestamp: Date;
  actor: string;
  /** Tracker-assigned, increases with each recorded change */
  sequenceId: number;
}

export interface Comment {
  id: string;
  author: string;
  createdAt: Date;
  /** Users mentioned in the body */
  mentions: string[];
  body: string;
  /** The comment marks the thread resolved */
  resolved: boolean;
}

export interface Ticket {
  key: string;
  summary: string;
  assignee: string | null;
  /** Current status as reported by the tracker */
  status: string;
  changelog: ChangelogEntry[];
  comments: Comment[];
}

// ============================================================================
// Progress reports
// ============================================================================

/** Canonical (normalized) status transition */
export interface StatusTransition {
  fromStatus: string;
  toStatus: string;
  timestamp: Date;
  actor: string;
  sequenceId: number;
}

/** `fromStatus` does not match the status the previous event moved to */
export interface ChangelogGap {
  kind: 'gap';
  sequenceId: number;
  at: Date;
  expectedFrom: string;
  actualFrom: string;
}

export type ReportIssue =
  | ChangelogGap
  | { kind: 'duplicate_sequence'; sequenceId: number }
  | { kind: 'duplicate_transition'; sequenceId: number; at: Date }
  | { kind: 'no_events' };

export interface Regression {
  fromStatus: string;
  toStatus: string;
  at: Date;
  actor: string;
}

export type CycleTime =
  | { status: 'complete'; startedAt: Date; doneAt: Date; durationMs: number }
  | { status: 'incomplete'; reason: 'not_started' | 'not_finished'; startedAt?: Date };

export type ReportConfidence = 'high' | 'partial';

export interface ProgressReport {
  ticketKey: string;
  summary: string;
  assignee: string | null;
  currentStatus: string;
  transitions: StatusTransition[];
  /** Milliseconds attributed to each status, in order of first appearance */
  timeInStatus: Record<string, number>;
  regressions: Regression[];
  cycleTime: CycleTime;
  issues: ReportIssue[];
  confidence: ReportConfidence;
  /** Set when the ticket currently sits in the done status */
  completedAt: Date | null;
  summaryText: string;
}

export type ThroughputBucket = 'day' | 'week';

export interface ReportWindow {
  from: Date;
  /** Exclusive */
  to: Date;
  bucket: ThroughputBucket;
}

export interface TeamReport {
  window: ReportWindow;
  ticketCount: number;
  statusTotals: Record<string, number>;
  /** Tickets with at least one transition inside the window */
  activeByAssignee: Record<string, number>;
  throughput: Array<{ period: string; completed: number }>;
  completedCount: number;
  averageCycleTimeMs: number | null;
}

// ============================================================================
// Follow-ups
// ============================================================================

export interface FollowUpKey {
  ticketKey: string;
  commentId: string;
  mentionedUser: string;
}

export interface FollowUpCandidate extends FollowUpKey {
  commentAuthor: string;
  commentCreatedAt: Date;
  firstSeenAt: Date;
  notified: boolean;
  notifiedAt: Date | null;
}

export interface ReminderDraft {
  recipient: string;
  subject: string;
  body: string;
}

/** A candidate past the staleness window that has not been notified */
export interface StaleFollowUp extends FollowUpCandidate {
  reminder: ReminderDraft;
}
