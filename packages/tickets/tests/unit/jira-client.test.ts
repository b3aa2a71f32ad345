/**
 * Jira Client Tests
 *
 * Runs against a fake fetch keyed by request path.
 *
 * @module @docpilot/tickets/tests/unit/jira-client
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { JiraClient, extractMentions, parseJiraDate } from '../../src/jira/client';
import { TicketTrackerError } from '../../src/errors';

type Handler = (url: URL, init: RequestInit) => Response;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function fakeFetch(routes: Record<string, Handler>) {
  const calls: Array<{ url: URL; init: RequestInit }> = [];
  const fetchImpl = vi.fn(async (input: string, init: RequestInit) => {
    const url = new URL(input);
    calls.push({ url, init });
    const handler = routes[`${init.method ?? 'GET'} ${url.pathname}`];
    return handler ? handler(url, init) : json({ errorMessages: ['no route'] }, 404);
  });
  return { fetchImpl, calls };
}

function client(routes: Record<string, Handler>) {
  const fake = fakeFetch(routes);
  const jira = new JiraClient(
    { baseUrl: 'https://jira.test/', token: 'test-token', maxRetries: 1, retryDelayMs: 0, pageSize: 1 },
    fake.fetchImpl
  );
  return { jira, ...fake };
}

const ISSUE = {
  key: 'OPS-7',
  fields: {
    summary: 'Rotate staging certificates',
    status: { name: 'In Review' },
    assignee: { name: 'alice', displayName: 'Alice Example' },
  },
  changelog: {
    histories: [
      {
        id: '10',
        created: '2024-05-06T09:00:00.000+0000',
        author: { name: 'alice' },
        items: [{ field: 'assignee', fromString: null, toString: 'alice' }],
      },
      {
        id: '11',
        created: '2024-05-06T10:30:00.000+0000',
        author: { name: 'alice' },
        items: [{ field: 'status', fromString: 'Open', toString: 'In Progress' }],
      },
    ],
  },
};

const COMMENTS = [
  { id: '100', author: { name: 'alice' }, body: '[~bob] can you confirm?', created: '2024-05-06T11:00:00.000+0000' },
  { id: '101', author: { name: 'bob' }, body: '(/) confirmed', created: '2024-05-06T12:00:00.000+0000' },
];

function commentPages(url: URL): Response {
  const startAt = Number(url.searchParams.get('startAt'));
  return json({ comments: COMMENTS.slice(startAt, startAt + 1), startAt, maxResults: 1, total: COMMENTS.length });
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('JiraClient', () => {
  it('should fetch a ticket with its status changelog and every comment page', async () => {
    const { jira, calls } = client({
      'GET /rest/api/2/issue/OPS-7': () => json(ISSUE),
      'GET /rest/api/2/issue/OPS-7/comment': commentPages,
    });

    const ticket = await jira.fetchTicket('OPS-7');

    expect(ticket).toEqual({
      key: 'OPS-7',
      summary: 'Rotate staging certificates',
      assignee: 'alice',
      status: 'In Review',
      changelog: [
        {
          fromStatus: 'Open',
          toStatus: 'In Progress',
          timestamp: new Date('2024-05-06T10:30:00.000Z'),
          actor: 'alice',
          sequenceId: 11,
        },
      ],
      comments: [
        {
          id: '100',
          author: 'alice',
          createdAt: new Date('2024-05-06T11:00:00.000Z'),
          mentions: ['bob'],
          body: '[~bob] can you confirm?',
          resolved: false,
        },
        {
          id: '101',
          author: 'bob',
          createdAt: new Date('2024-05-06T12:00:00.000Z'),
          mentions: [],
          body: '(/) confirmed',
          resolved: true,
        },
      ],
    });
    expect(calls.filter((c) => c.url.pathname.endsWith('/comment'))).toHaveLength(2);
    expect(new Headers(calls[0].init.headers).get('Authorization')).toBe('Bearer test-token');
  });

  it('should fetch only the changelog', async () => {
    const { jira, calls } = client({ 'GET /rest/api/2/issue/OPS-7': () => json(ISSUE) });

    const changelog = await jira.fetchChangelog('OPS-7');

    expect(changelog.map((e) => e.sequenceId)).toEqual([11]);
    expect(calls[0].url.searchParams.get('expand')).toBe('changelog');
  });

  it('should map a missing ticket to a not_found error without retrying', async () => {
    const { jira, fetchImpl } = client({});

    const error = await jira.fetchChangelog('OPS-404').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TicketTrackerError);
    expect(error).toMatchObject({ kind: 'not_found', statusCode: 404, retryable: false });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should map 401 and 403 to access_denied', async () => {
    const { jira } = client({ 'GET /rest/api/2/issue/OPS-7': () => json({}, 403) });

    await expect(jira.fetchChangelog('OPS-7')).rejects.toMatchObject({ kind: 'access_denied' });
  });

  it('should retry a server error and then give up', async () => {
    const { jira, fetchImpl } = client({ 'GET /rest/api/2/issue/OPS-7': () => json({}, 503) });

    await expect(jira.fetchChangelog('OPS-7')).rejects.toMatchObject({ kind: 'transient', statusCode: 503 });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should recover when a retry succeeds', async () => {
    let attempts = 0;
    const { jira } = client({
      'GET /rest/api/2/issue/OPS-7': () => (++attempts === 1 ? json({}, 502) : json(ISSUE)),
    });

    await expect(jira.fetchChangelog('OPS-7')).resolves.toHaveLength(1);
    expect(attempts).toBe(2);
  });

  it('should treat a network failure as transient', async () => {
    const jira = new JiraClient({ baseUrl: 'https://jira.test', token: 'test-token', maxRetries: 0 }, async () => {
      throw new TypeError('fetch failed');
    });

    await expect(jira.fetchChangelog('OPS-7')).rejects.toMatchObject({
      kind: 'transient',
      message: 'Jira request failed: fetch failed',
    });
  });

  it('should reject a response of the wrong shape', async () => {
    const { jira } = client({ 'GET /rest/api/2/issue/OPS-7': () => json({ fields: {} }) });

    await expect(jira.fetchChangelog('OPS-7')).rejects.toMatchObject({ kind: 'invalid_response' });
  });

  it('should post a comment once, even on a server error', async () => {
    const { jira, calls } = client({
      'POST /rest/api/2/issue/OPS-7/comment': (_url, init) =>
        init.body === JSON.stringify({ body: 'hello' }) ? json({ id: '200' }, 201) : json({}, 400),
    });

    await expect(jira.postComment('OPS-7', 'hello')).resolves.toEqual({ id: '200' });

    const failing = client({ 'POST /rest/api/2/issue/OPS-7/comment': () => json({}, 503) });
    await expect(failing.jira.postComment('OPS-7', 'hello')).rejects.toMatchObject({ kind: 'transient' });
    expect(failing.calls).toHaveLength(1);
    expect(calls[0].init.method).toBe('POST');
  });

  it('should page through search results', async () => {
    const second = { ...ISSUE, key: 'OPS-8' };
    const { jira, calls } = client({
      'GET /rest/api/2/search': (url) => {
        const startAt = Number(url.searchParams.get('startAt'));
        return json({ issues: [startAt === 0 ? ISSUE : second], startAt, total: 2 });
      },
    });

    const tickets = await jira.searchTickets('project = OPS');

    expect(tickets.map((t) => t.key)).toEqual(['OPS-7', 'OPS-8']);
    expect(tickets[0].comments).toEqual([]);
    expect(calls[0].url.searchParams.get('jql')).toBe('project = OPS');
  });

  it('should build browse links without a trailing slash', () => {
    const { jira } = client({});

    expect(jira.ticketUrl('OPS-7')).toBe('https://jira.test/browse/OPS-7');
  });
});

describe('extractMentions', () => {
  it('should collect distinct user and account mentions', () => {
    expect(extractMentions('[~bob] and [~accountid:5b10a] and [~bob] again')).toEqual(['bob', '5b10a']);
  });
});

describe('parseJiraDate', () => {
  it('should accept offsets without a colon', () => {
    expect(parseJiraDate('2024-05-06T09:00:00.000+0200').toISOString()).toBe('2024-05-06T07:00:00.000Z');
  });

  it('should reject an unparseable timestamp', () => {
    expect(() => parseJiraDate('yesterday')).toThrow(TicketTrackerError);
  });
});
