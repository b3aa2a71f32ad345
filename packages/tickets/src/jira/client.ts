/**
 * Jira Client
 *
 * `TicketTracker` over the Jira REST API v2 with a bearer token. Reads are
 * retried on transient failures; posting a comment is not, since a retry
 * after a lost response would post it twice.
 *
 * @module @docpilot/tickets/jira/client
 */

import { AbortError, TimeoutError, isRetryableError, withRetry, withTimeout } from '@docpilot/database';
import { errorMessage } from '@docpilot/rag';
import { z } from 'zod';
import { TicketTrackerError } from '../errors';
import type { TicketTracker } from '../tracker';
import type { ChangelogEntry, Comment, Ticket } from '../types';

export interface JiraClientConfig {
  /** Site root, e.g. https://jira.example.com */
  baseUrl: string;
  token: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  pageSize: number;
  /** Upper bound on tickets returned by a search */
  maxSearchResults: number;
  /** A comment matching this marks the thread resolved */
  resolvedPattern: RegExp;
}

const DEFAULT_CONFIG: Omit<JiraClientConfig, 'baseUrl' | 'token'> = {
  timeoutMs: 30000,
  maxRetries: 2,
  retryDelayMs: 500,
  pageSize: 50,
  maxSearchResults: 500,
  resolvedPattern: /^\s*(?:\(\/\)|\[resolved\])/i,
};

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

// ============================================================================
// Response schemas
// ============================================================================

const userSchema = z
  .object({
    name: z.string().optional(),
    accountId: z.string().optional(),
    displayName: z.string().optional(),
  })
  .nullish();

// Items are read as records: `toString` would otherwise resolve to
// Object.prototype.toString whenever the field is missing.
const historySchema = z.object({
  id: z.string(),
  created: z.string(),
  author: userSchema,
  items: z.array(z.record(z.string(), z.unknown())),
});

const issueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().default(''),
    status: z.object({ name: z.string() }).nullish(),
    assignee: userSchema,
  }),
  changelog: z.object({ histories: z.array(historySchema) }).optional(),
});

const commentSchema = z.object({
  id: z.string(),
  author: userSchema,
  body: z.string().default(''),
  created: z.string(),
});

const commentPageSchema = z.object({
  comments: z.array(commentSchema),
  startAt: z.number().default(0),
  total: z.number(),
});

const searchPageSchema = z.object({
  issues: z.array(issueSchema),
  startAt: z.number().default(0),
  total: z.number(),
});

const createdCommentSchema = z.object({ id: z.string() });

type JiraUser = z.infer<typeof userSchema>;
type JiraIssue = z.infer<typeof issueSchema>;
type JiraHistory = z.infer<typeof historySchema>;

// ============================================================================
// Mapping
// ============================================================================

const MENTION = /\[~(?:accountid:)?([^\]]+)\]/g;

export function extractMentions(body: string): string[] {
  return [...new Set([...body.matchAll(MENTION)].map((match) => match[1].trim()))];
}

/** Jira writes offsets as "+0000"; Date wants "+00:00" */
export function parseJiraDate(value: string): Date {
  const date = new Date(value.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
  if (Number.isNaN(date.getTime())) {
    throw new TicketTrackerError(`Invalid Jira timestamp: "${value}"`, 'invalid_response');
  }
  return date;
}

function userName(user: JiraUser): string {
  return user?.name ?? user?.accountId ?? user?.displayName ?? 'unknown';
}

function stringField(item: Record<string, unknown>, field: string): string | null {
  const value = Object.hasOwn(item, field) ? item[field] : undefined;
  return typeof value === 'string' ? value : null;
}

function toChangelog(histories: JiraHistory[]): ChangelogEntry[] {
  const entries: ChangelogEntry[] = [];
  for (const history of histories) {
    const item = history.items.find((i) => i.field === 'status');
    if (!item) continue;

    const sequenceId = Number(history.id);
    if (!Number.isInteger(sequenceId)) {
      throw new TicketTrackerError(`Invalid changelog id: "${history.id}"`, 'invalid_response');
    }

    entries.push({
      fromStatus: stringField(item, 'fromString') ?? '',
      toStatus: stringField(item, 'toString') ?? '',
      timestamp: parseJiraDate(history.created),
      actor: userName(history.author),
      sequenceId,
    });
  }
  return entries;
}

// ============================================================================
// Client
// ============================================================================

export class JiraClient implements TicketTracker {
  private config: JiraClientConfig;
  private fetchImpl: FetchLike;

  constructor(
    config: Pick<JiraClientConfig, 'baseUrl' | 'token'> & Partial<JiraClientConfig>,
    fetchImpl: FetchLike = fetch
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config, baseUrl: config.baseUrl.replace(/\/$/, '') };
    this.fetchImpl = fetchImpl;
  }

  ticketUrl(key: string): string {
    return `${this.config.baseUrl}/browse/${encodeURIComponent(key)}`;
  }

  async fetchTicket(key: string, signal?: AbortSignal): Promise<Ticket> {
    const [issue, comments] = await Promise.all([
      this.fetchIssue(key, 'summary,status,assignee', signal),
      this.fetchComments(key, signal),
    ]);
    return { ...this.toTicket(issue), comments };
  }

  async fetchChangelog(key: string, signal?: AbortSignal): Promise<ChangelogEntry[]> {
    const issue = await this.fetchIssue(key, 'status', signal);
    return toChangelog(issue.changelog?.histories ?? []);
  }

  async fetchComments(key: string, signal?: AbortSignal): Promise<Comment[]> {
    const comments: Comment[] = [];
    let startAt = 0;

    while (true) {
      const params = new URLSearchParams({
        startAt: String(startAt),
        maxResults: String(this.config.pageSize),
        orderBy: 'created',
      });
      const page = this.parse(
        commentPageSchema,
        await this.get(`/rest/api/2/issue/${encodeURIComponent(key)}/comment?${params}`, signal)
      );

      for (const c of page.comments) {
        comments.push({
          id: c.id,
          author: userName(c.author),
          createdAt: parseJiraDate(c.created),
          mentions: extractMentions(c.body),
          body: c.body,
          resolved: this.config.resolvedPattern.test(c.body),
        });
      }

      startAt = page.startAt + page.comments.length;
      if (page.comments.length === 0 || startAt >= page.total) break;
    }

    return comments;
  }

  async postComment(key: string, body: string, signal?: AbortSignal): Promise<{ id: string }> {
    const path = `/rest/api/2/issue/${encodeURIComponent(key)}/comment`;
    const created = await withTimeout(
      (timeoutSignal) =>
        this.send(path, { method: 'POST', body: JSON.stringify({ body }) }, timeoutSignal),
      this.config.timeoutMs,
      `Jira POST ${path}`,
      signal
    );
    return this.parse(createdCommentSchema, created);
  }

  async searchTickets(query: string, signal?: AbortSignal): Promise<Ticket[]> {
    const tickets: Ticket[] = [];
    let startAt = 0;

    while (tickets.length < this.config.maxSearchResults) {
      const params = new URLSearchParams({
        jql: query,
        fields: 'summary,status,assignee',
        expand: 'changelog',
        startAt: String(startAt),
        maxResults: String(Math.min(this.config.pageSize, this.config.maxSearchResults - tickets.length)),
      });
      const page = this.parse(searchPageSchema, await this.get(`/rest/api/2/search?${params}`, signal));

      tickets.push(...page.issues.map((issue) => this.toTicket(issue)));
      startAt = page.startAt + page.issues.length;
      if (page.issues.length === 0 || startAt >= page.total) break;
    }

    return tickets;
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private async fetchIssue(key: string, fields: string, signal?: AbortSignal): Promise<JiraIssue> {
    const params = new URLSearchParams({ fields, expand: 'changelog' });
    return this.parse(issueSchema, await this.get(`/rest/api/2/issue/${encodeURIComponent(key)}?${params}`, signal));
  }

  private toTicket(issue: JiraIssue): Ticket {
    return {
      key: issue.key,
      summary: issue.fields.summary,
      assignee: issue.fields.assignee ? userName(issue.fields.assignee) : null,
      status: issue.fields.status?.name ?? '',
      changelog: toChangelog(issue.changelog?.histories ?? []),
      comments: [],
    };
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new TicketTrackerError(
        `Unexpected Jira response: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
        'invalid_response',
        { cause: result.error }
      );
    }
    return result.data;
  }

  private get(path: string, signal?: AbortSignal): Promise<unknown> {
    const label = `Jira GET ${path.split('?')[0]}`;
    return withRetry(
      () =>
        withTimeout((timeoutSignal) => this.send(path, { method: 'GET' }, timeoutSignal), this.config.timeoutMs, label, signal),
      {
        maxRetries: this.config.maxRetries,
        initialDelayMs: this.config.retryDelayMs,
        shouldRetry: isRetryableError,
        signal,
        label,
      }
    );
  }

  private async send(path: string, init: RequestInit, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}${path}`, {
        ...init,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.token}`,
        },
        signal,
      });
    } catch (error) {
      if (error instanceof AbortError || error instanceof TimeoutError) throw error;
      throw new TicketTrackerError(`Jira request failed: ${errorMessage(error)}`, 'transient', { cause: error });
    }

    if (response.ok) {
      try {
        return await response.json();
      } catch (error) {
        throw new TicketTrackerError('Jira returned a non-JSON body', 'invalid_response', { cause: error });
      }
    }

    const where = path.split('?')[0];
    const message = `Jira ${where} returned ${response.status}`;
    const statusCode = response.status;
    if (statusCode === 404) {
      throw new TicketTrackerError(message, 'not_found', { statusCode });
    }
    if (statusCode === 401 || statusCode === 403) {
      throw new TicketTrackerError(message, 'access_denied', { statusCode });
    }
    if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
      throw new TicketTrackerError(message, 'transient', { statusCode });
    }
    throw new TicketTrackerError(message, 'rejected', { statusCode });
  }
}

export function createJiraClient(
  config: Pick<JiraClientConfig, 'baseUrl' | 'token'> & Partial<JiraClientConfig>,
  fetchImpl?: FetchLike
): JiraClient {
  return new JiraClient(config, fetchImpl);
}
