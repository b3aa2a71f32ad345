/**
 * Human-readable progress summaries.
 *
 * @module @docpilot/tickets/changelog/summary
 */

import type { ProgressReport, ReportIssue } from '../types';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * The two most significant of days, hours and minutes, e.g. "2d 3h" or "45m"
 */
export function formatDuration(ms: number): string {
  const minutes = Math.floor(Math.max(0, ms) / MINUTE);
  const parts = [
    [Math.floor(minutes / (DAY / MINUTE)), 'd'],
    [Math.floor((minutes % (DAY / MINUTE)) / 60), 'h'],
    [minutes % 60, 'm'],
  ] as const;

  const shown = parts.filter(([value]) => value > 0).slice(0, 2);
  return shown.length === 0 ? '0m' : shown.map(([value, unit]) => `${value}${unit}`).join(' ');
}

export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function describeIssues(issues: ReportIssue[], cycleIncomplete: boolean): string {
  const gaps = issues.filter((issue) => issue.kind === 'gap').length;
  const duplicates = issues.filter(
    (issue) => issue.kind === 'duplicate_sequence' || issue.kind === 'duplicate_transition'
  ).length;

  const notes: string[] = [];
  if (issues.some((issue) => issue.kind === 'no_events')) notes.push('no status changes recorded');
  if (gaps > 0) notes.push(plural(gaps, 'changelog gap'));
  if (duplicates > 0) notes.push(`${plural(duplicates, 'duplicate event')} removed`);
  if (cycleIncomplete) notes.push('cycle time incomplete');
  return notes.join('; ');
}

export function summarizeReport(report: Omit<ProgressReport, 'summaryText'>): string {
  const lines = [
    `${report.ticketKey}: ${report.summary}`,
    `Status: ${report.currentStatus}, ${report.assignee ? `assigned to ${report.assignee}` : 'unassigned'}`,
  ];

  const cycle = report.cycleTime;
  if (cycle.status === 'complete') {
    lines.push(
      `Cycle time: ${formatDuration(cycle.durationMs)} (${isoDate(cycle.startedAt)} to ${isoDate(cycle.doneAt)})`
    );
  } else if (cycle.startedAt) {
    lines.push(`Cycle time: in progress since ${isoDate(cycle.startedAt)}`);
  } else {
    lines.push('Cycle time: not started');
  }

  const durations = Object.entries(report.timeInStatus);
  if (durations.length > 0) {
    lines.push(`Time in status: ${durations.map(([status, ms]) => `${status} ${formatDuration(ms)}`).join(', ')}`);
  }

  if (report.regressions.length > 0) {
    const moves = report.regressions.map((r) => `${r.fromStatus} -> ${r.toStatus} on ${isoDate(r.at)}`);
    lines.push(`Regressions: ${moves.join(', ')}`);
  }

  lines.push(
    report.confidence === 'high'
      ? 'Confidence: high'
      : `Confidence: partial (${describeIssues(report.issues, cycle.status === 'incomplete')})`
  );

  return lines.join('\n');
}
