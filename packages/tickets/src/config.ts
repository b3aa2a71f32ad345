/**
 * Ticket tracker and follow-up settings from the environment.
 *
 * @module @docpilot/tickets/config
 */

import { parseEnv, type Env } from '@docpilot/database';
import { z } from 'zod';
import type { WorkflowConfig } from './changelog/workflow';

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean)
  )
  .refine((items) => items.length > 0, 'must name at least one status');

const envSchema = z
  .object({
    JIRA_BASE_URL: z.string().url().optional(),
    JIRA_TOKEN: z.string().optional(),
    JIRA_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    JIRA_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    JIRA_TEAM_QUERY: z.string().default('updated >= -30d ORDER BY updated DESC'),

    FOLLOW_UP_STALENESS_HOURS: z.coerce.number().positive().default(48),

    WORKFLOW_STATUSES: commaList.default('open,to-do,in-progress,in-review,testing,done'),
    WORKFLOW_IN_PROGRESS_STATUS: z.string().default('in-progress'),
    WORKFLOW_DONE_STATUS: z.string().default('done'),
  })
  .superRefine((config, ctx) => {
    for (const status of [config.WORKFLOW_IN_PROGRESS_STATUS, config.WORKFLOW_DONE_STATUS]) {
      if (!config.WORKFLOW_STATUSES.includes(status)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['WORKFLOW_STATUSES'], message: `missing "${status}"` });
      }
    }
  });

export type TicketsConfig = z.infer<typeof envSchema>;

export function loadTicketsConfig(env: Env = process.env): TicketsConfig {
  return parseEnv(envSchema, env, 'tickets');
}

let cached: TicketsConfig | null = null;

export function getTicketsConfig(): TicketsConfig {
  if (!cached) {
    cached = loadTicketsConfig();
  }
  return cached;
}

export function stalenessWindowMs(config: TicketsConfig): number {
  return Math.round(config.FOLLOW_UP_STALENESS_HOURS * 60 * 60 * 1000);
}

export function workflowConfig(config: TicketsConfig): Partial<WorkflowConfig> {
  return {
    statuses: config.WORKFLOW_STATUSES,
    inProgressStatus: config.WORKFLOW_IN_PROGRESS_STATUS,
    doneStatus: config.WORKFLOW_DONE_STATUS,
  };
}
