/**
 * Team-level aggregation of progress reports over a time window.
 *
 * @module @docpilot/tickets/changelog/team
 */

import type { ProgressReport, ReportWindow, TeamReport, ThroughputBucket } from '../types';
import { isoDate } from './summary';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Start of the UTC day, or of the UTC week (Monday) */
export function bucketStart(date: Date, bucket: ThroughputBucket): Date {
  const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  if (bucket === 'day') return new Date(day);
  const sinceMonday = (new Date(day).getUTCDay() + 6) % 7;
  return new Date(day - sinceMonday * DAY_MS);
}

function within(date: Date, window: ReportWindow): boolean {
  return date >= window.from && date < window.to;
}

/**
 * Per-status time clipped to the window, using the same attribution as the
 * per-ticket report
 */
function addStatusTotals(totals: Record<string, number>, report: ProgressReport, window: ReportWindow): void {
  const { transitions } = report;
  for (let i = 1; i < transitions.length; i++) {
    const start = Math.max(transitions[i - 1].timestamp.getTime(), window.from.getTime());
    const end = Math.min(transitions[i].timestamp.getTime(), window.to.getTime());
    if (end <= start) continue;
    const status = transitions[i].fromStatus;
    totals[status] = (totals[status] ?? 0) + (end - start);
  }
}

export function aggregateTeam(reports: ProgressReport[], window: ReportWindow): TeamReport {
  const statusTotals: Record<string, number> = {};
  const activeByAssignee: Record<string, number> = {};
  const completedPerPeriod = new Map<string, number>();
  const cycleTimes: number[] = [];

  for (const report of reports) {
    addStatusTotals(statusTotals, report, window);

    if (report.transitions.some((t) => within(t.timestamp, window))) {
      const assignee = report.assignee ?? 'unassigned';
      activeByAssignee[assignee] = (activeByAssignee[assignee] ?? 0) + 1;
    }

    if (report.completedAt && within(report.completedAt, window)) {
      const period = isoDate(bucketStart(report.completedAt, window.bucket));
      completedPerPeriod.set(period, (completedPerPeriod.get(period) ?? 0) + 1);
      if (report.cycleTime.status === 'complete') cycleTimes.push(report.cycleTime.durationMs);
    }
  }

  const throughput: TeamReport['throughput'] = [];
  const step = window.bucket === 'day' ? DAY_MS : 7 * DAY_MS;
  for (let t = bucketStart(window.from, window.bucket).getTime(); t < window.to.getTime(); t += step) {
    const period = isoDate(new Date(t));
    throughput.push({ period, completed: completedPerPeriod.get(period) ?? 0 });
  }

  const completedCount = [...completedPerPeriod.values()].reduce((sum, n) => sum + n, 0);

  return {
    window,
    ticketCount: reports.length,
    statusTotals,
    activeByAssignee,
    throughput,
    completedCount,
    averageCycleTimeMs:
      cycleTimes.length > 0 ? Math.round(cycleTimes.reduce((sum, ms) => sum + ms, 0) / cycleTimes.length) : null,
  };
}
