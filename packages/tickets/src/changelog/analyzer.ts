/**
 * Changelog Analyzer
 *
 * Turns a ticket's raw status changelog into a progress report: cleaned
 * transition sequence, time spent per status, regressions, cycle time and a
 * data-quality verdict.
 *
 * Cleaning order:
 * 1. Sort by (timestamp, sequenceId)
 * 2. Drop entries whose sequenceId was already seen
 * 3. Collapse a transition identical to the one right before it
 * 4. Flag gaps where fromStatus differs from the previous toStatus
 *
 * The time between two consecutive transitions is attributed to the status
 * the later transition leaves. Time before the first transition and after the
 * last one is not counted, so the durations always add up to the span from
 * the first to the last transition.
 *
 * @module @docpilot/tickets/changelog/analyzer
 */

import type {
  CycleTime,
  ProgressReport,
  Regression,
  ReportIssue,
  ReportWindow,
  StatusTransition,
  TeamReport,
  Ticket,
} from '../types';
import { summarizeReport } from './summary';
import { aggregateTeam } from './team';
import { Workflow, type WorkflowConfig } from './workflow';

function compareEntries(a: StatusTransition, b: StatusTransition): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.sequenceId - b.sequenceId;
}

export class ChangelogAnalyzer {
  readonly workflow: Workflow;

  constructor(config: Partial<WorkflowConfig> = {}) {
    this.workflow = new Workflow(config);
  }

  analyze(ticket: Ticket): ProgressReport {
    const { transitions, issues } = this.clean(ticket);
    const { doneStatus } = this.workflow.config;

    const currentStatus = this.workflow.normalize(ticket.status);
    const cycleTime = this.cycleTime(transitions);
    if (transitions.length === 0) issues.push({ kind: 'no_events' });

    const lastDone = transitions.filter((t) => t.toStatus === doneStatus).at(-1);

    const report: Omit<ProgressReport, 'summaryText'> = {
      ticketKey: ticket.key,
      summary: ticket.summary,
      assignee: ticket.assignee,
      currentStatus,
      transitions,
      timeInStatus: this.timeInStatus(transitions),
      regressions: this.regressions(transitions),
      cycleTime,
      issues,
      confidence: issues.length > 0 || cycleTime.status === 'incomplete' ? 'partial' : 'high',
      completedAt: currentStatus === doneStatus && lastDone ? lastDone.timestamp : null,
    };

    return { ...report, summaryText: summarizeReport(report) };
  }

  analyzeTeam(tickets: Ticket[], window: ReportWindow): TeamReport {
    return aggregateTeam(
      tickets.map((ticket) => this.analyze(ticket)),
      window
    );
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private clean(ticket: Ticket): { transitions: StatusTransition[]; issues: ReportIssue[] } {
    const sorted = ticket.changelog
      .map((entry) => ({
        ...entry,
        fromStatus: this.workflow.normalize(entry.fromStatus),
        toStatus: this.workflow.normalize(entry.toStatus),
      }))
      .sort(compareEntries);

    const transitions: StatusTransition[] = [];
    const issues: ReportIssue[] = [];
    const seen = new Set<number>();

    for (const entry of sorted) {
      if (seen.has(entry.sequenceId)) {
        issues.push({ kind: 'duplicate_sequence', sequenceId: entry.sequenceId });
        continue;
      }
      seen.add(entry.sequenceId);

      const previous = transitions.at(-1);
      if (previous && previous.fromStatus === entry.fromStatus && previous.toStatus === entry.toStatus) {
        issues.push({ kind: 'duplicate_transition', sequenceId: entry.sequenceId, at: entry.timestamp });
        continue;
      }
      if (previous && previous.toStatus !== entry.fromStatus) {
        issues.push({
          kind: 'gap',
          sequenceId: entry.sequenceId,
          at: entry.timestamp,
          expectedFrom: previous.toStatus,
          actualFrom: entry.fromStatus,
        });
      }

      transitions.push(entry);
    }

    return { transitions, issues };
  }

  private timeInStatus(transitions: StatusTransition[]): Record<string, number> {
    const totals: Record<string, number> = {};
    for (let i = 1; i < transitions.length; i++) {
      const status = transitions[i].fromStatus;
      const elapsed = transitions[i].timestamp.getTime() - transitions[i - 1].timestamp.getTime();
      totals[status] = (totals[status] ?? 0) + elapsed;
    }
    return totals;
  }

  private regressions(transitions: StatusTransition[]): Regression[] {
    const visited = new Set<string>();
    const regressions: Regression[] = [];

    if (transitions.length > 0) visited.add(transitions[0].fromStatus);
    for (const t of transitions) {
      if (visited.has(t.toStatus) && this.workflow.isBackwards(t.fromStatus, t.toStatus)) {
        regressions.push({ fromStatus: t.fromStatus, toStatus: t.toStatus, at: t.timestamp, actor: t.actor });
      }
      visited.add(t.toStatus);
    }
    return regressions;
  }

  private cycleTime(transitions: StatusTransition[]): CycleTime {
    const { inProgressStatus, doneStatus } = this.workflow.config;

    const start = transitions.findIndex((t) => t.toStatus === inProgressStatus);
    if (start === -1) {
      return { status: 'incomplete', reason: 'not_started' };
    }

    const startedAt = transitions[start].timestamp;
    const done = transitions.slice(start + 1).find((t) => t.toStatus === doneStatus);
    if (!done) {
      return { status: 'incomplete', reason: 'not_finished', startedAt };
    }

    return {
      status: 'complete',
      startedAt,
      doneAt: done.timestamp,
      durationMs: done.timestamp.getTime() - startedAt.getTime(),
    };
  }
}

export function createChangelogAnalyzer(config?: Partial<WorkflowConfig>): ChangelogAnalyzer {
  return new ChangelogAnalyzer(config);
}
