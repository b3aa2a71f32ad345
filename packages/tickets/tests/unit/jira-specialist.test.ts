/**
 * Jira Specialist Tests
 *
 * @module @docpilot/tickets/tests/unit/jira-specialist
 */

import { describe, it, expect } from 'vitest';
import { ChangelogAnalyzer } from '../../src/changelog/analyzer';
import { TicketTrackerError } from '../../src/errors';
import { JiraSpecialist, NO_TICKET_TEXT } from '../../src/jira/specialist';
import { FakeTicketTracker, entry, makeTicket } from '../support/fakes';

const analyzer = new ChangelogAnalyzer();

const DONE_TICKET = makeTicket({
  key: 'OPS-1',
  status: 'Done',
  changelog: [entry(1, 'Open', 'In Progress', 0), entry(2, 'In Progress', 'Done', 26)],
});

function setup() {
  const tracker = new FakeTicketTracker([DONE_TICKET]);
  return { tracker, specialist: new JiraSpecialist(tracker, analyzer) };
}

describe('JiraSpecialist', () => {
  it('should rate questions naming a ticket key as highly relevant', () => {
    const { specialist } = setup();

    expect(specialist.classifyRelevance('How is OPS-1 going?')).toBe(0.95);
    expect(specialist.classifyRelevance('What is the status of the sprint?')).toBe(0.75);
    expect(specialist.classifyRelevance('How do I reset my password?')).toBe(0);
  });

  it('should answer with the progress report of the named ticket', async () => {
    const { specialist } = setup();

    const answer = await specialist.answer({ question: 'Where is OPS-1 at?' });

    expect(answer.status).toBe('grounded');
    expect(answer.text).toBe(`${analyzer.analyze(DONE_TICKET).summaryText} [1]`);
    expect(answer.citations).toEqual([
      { collection: 'jira', path: 'OPS-1', title: 'Fix login redirect', url: 'https://jira.test/browse/OPS-1', score: 1 },
    ]);
  });

  it('should note tickets that do not exist', async () => {
    const { specialist } = setup();

    const answer = await specialist.answer({ question: 'Compare OPS-1 with OPS-9' });

    expect(answer.text.endsWith('\n\nOPS-9: ticket not found')).toBe(true);
    expect(answer.citations.map((c) => c.path)).toEqual(['OPS-1']);
  });

  it('should give no grounded answer when no named ticket can be read', async () => {
    const { specialist } = setup();

    const answer = await specialist.answer({ question: 'What about OPS-9?' });

    expect(answer).toEqual({ status: 'no_grounded_answer', text: 'OPS-9: ticket not found', citations: [], chunks: [] });
  });

  it('should ask for a ticket key when none is named', async () => {
    const { specialist } = setup();

    const answer = await specialist.answer({ question: 'How is the sprint going?' });

    expect(answer).toEqual({ status: 'no_grounded_answer', text: NO_TICKET_TEXT, citations: [], chunks: [] });
  });

  it('should fail on a transient tracker error so the router can retry', async () => {
    const { tracker, specialist } = setup();
    tracker.failures.set('OPS-1', new TicketTrackerError('Jira request failed: fetch failed', 'transient'));

    await expect(specialist.answer({ question: 'OPS-1?' })).rejects.toThrow('Jira request failed: fetch failed');
  });

  it('should stream the same answer as a single fragment', async () => {
    const { specialist } = setup();

    const stream = await specialist.streamAnswer({ question: 'Where is OPS-1 at?' });
    const fragments: string[] = [];
    for await (const fragment of stream.fragments) fragments.push(fragment);

    expect(stream.citations.map((c) => c.path)).toEqual(['OPS-1']);
    expect(fragments).toEqual([`${analyzer.analyze(DONE_TICKET).summaryText} [1]`]);
  });
});
