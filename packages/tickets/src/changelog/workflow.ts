/**
 * Workflow
 *
 * Maps tracker status names onto a canonical, ordered workflow. Names are
 * lowercased and hyphenated before the alias lookup, so "In Progress",
 * "in_progress" and "IN-PROGRESS" all become "in-progress".
 *
 * @module @docpilot/tickets/changelog/workflow
 */

export interface WorkflowConfig {
  /** Canonical statuses, earliest first */
  statuses: string[];
  /** Normalized tracker name -> canonical status */
  aliases: Record<string, string>;
  inProgressStatus: string;
  doneStatus: string;
}

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  statuses: ['open', 'to-do', 'in-progress', 'in-review', 'testing', 'done'],
  aliases: {
    new: 'open',
    reopened: 'open',
    backlog: 'to-do',
    todo: 'to-do',
    'selected-for-development': 'to-do',
    'development-to-do': 'to-do',
    'work-in-progress': 'in-progress',
    'in-development': 'in-progress',
    'development-in-progress': 'in-progress',
    review: 'in-review',
    'code-review': 'in-review',
    'under-review': 'in-review',
    qa: 'testing',
    'in-qa': 'testing',
    'in-testing': 'testing',
    closed: 'done',
    resolved: 'done',
    complete: 'done',
    completed: 'done',
  },
  inProgressStatus: 'in-progress',
  doneStatus: 'done',
};

export class Workflow {
  readonly config: WorkflowConfig;
  private ranks: Map<string, number>;

  constructor(config: Partial<WorkflowConfig> = {}) {
    this.config = { ...DEFAULT_WORKFLOW_CONFIG, ...config };
    this.ranks = new Map(this.config.statuses.map((status, index) => [status, index]));
  }

  normalize(name: string): string {
    const key = name.trim().toLowerCase().replace(/[\s_]+/g, '-');
    return this.config.aliases[key] ?? key;
  }

  /** Position in the canonical workflow; undefined for statuses outside it */
  rank(status: string): number | undefined {
    return this.ranks.get(status);
  }

  /** `to` comes before `from` in the workflow; unknown statuses never compare */
  isBackwards(fromStatus: string, toStatus: string): boolean {
    const from = this.rank(fromStatus);
    const to = this.rank(toStatus);
    return from !== undefined && to !== undefined && to < from;
  }
}
