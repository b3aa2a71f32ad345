/**
 * @module @docpilot/tickets/tracker
 */

import type { ChangelogEntry, Comment, Ticket } from './types';

/**
 * Read and comment access to an issue tracker. Failures surface as
 * `TicketTrackerError`.
 */
export interface TicketTracker {
  /** Ticket with its full changelog and comment thread */
  fetchTicket(key: string, signal?: AbortSignal): Promise<Ticket>;
  fetchChangelog(key: string, signal?: AbortSignal): Promise<ChangelogEntry[]>;
  fetchComments(key: string, signal?: AbortSignal): Promise<Comment[]>;
  postComment(key: string, body: string, signal?: AbortSignal): Promise<{ id: string }>;
  /** Tickets matching a query, with changelogs but without comments */
  searchTickets(query: string, signal?: AbortSignal): Promise<Ticket[]>;
  /** Browser link for a ticket */
  ticketUrl(key: string): string;
}
