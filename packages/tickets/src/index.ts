/**
 * @docpilot/tickets
 *
 * Ticket progress reports from status changelogs, unanswered-question
 * follow-ups, and the Jira tracker and router specialist.
 *
 * @module @docpilot/tickets
 */

export * from './types';
export * from './errors';
export type { TicketTracker } from './tracker';

// Configuration
export {
  loadTicketsConfig,
  getTicketsConfig,
  stalenessWindowMs,
  workflowConfig,
  type TicketsConfig,
} from './config';

// Changelog analysis
export { ChangelogAnalyzer, createChangelogAnalyzer } from './changelog/analyzer';
export { Workflow, DEFAULT_WORKFLOW_CONFIG, type WorkflowConfig } from './changelog/workflow';
export { aggregateTeam, bucketStart } from './changelog/team';
export { formatDuration, summarizeReport } from './changelog/summary';

// Follow-ups
export {
  FollowUpDetector,
  createFollowUpDetector,
  DEFAULT_QUESTION_PATTERN,
  REMINDER_MARKER,
  type FollowUpDetectorConfig,
  type OpenQuestion,
} from './follow-ups/detector';
export { PostgresFollowUpStore, type FollowUpStore } from './follow-ups/store';
export { FollowUpNotifier, formatReminderComment, type NotifyResult } from './follow-ups/notifier';

// Jira
export { JiraClient, createJiraClient, extractMentions, parseJiraDate, type JiraClientConfig } from './jira/client';
export { JiraSpecialist, createJiraSpecialist, NO_TICKET_TEXT, type JiraSpecialistConfig } from './jira/specialist';
