/**
 * RAG configuration: model endpoints and tuning from the environment,
 * collections and specialists from the sources file.
 *
 * @module @docpilot/rag/config
 */

import { readFile } from 'node:fs/promises';
import { parseEnv, type Env } from '@docpilot/database';
import { z } from 'zod';

// ============================================================================
// Environment
// ============================================================================

const envSchema = z.object({
  EMBEDDING_BASE_URL: z.string().url().default('http://localhost:8001/v1'),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),
  EMBEDDING_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  EMBEDDING_MIN_INTERVAL_MS: z.coerce.number().int().min(0).default(0),

  LLM_BASE_URL: z.string().url().default('http://localhost:8000/v1'),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  LLM_STREAM_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  INGEST_CONCURRENCY: z.coerce.number().int().positive().default(4),
  CHUNK_MAX_TOKENS: z.coerce.number().int().positive().default(800),
  CHUNK_OVERLAP_TOKENS: z.coerce.number().int().min(0).default(50),

  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(8),
  RETRIEVAL_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.5),
  CONTEXT_TOKEN_BUDGET: z.coerce.number().int().positive().default(3000),

  ROUTER_MODE: z.enum(['single', 'multi']).default('single'),
  ROUTER_CLASSIFIER: z.enum(['heuristic', 'model']).default('heuristic'),
  ROUTER_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  ROUTER_TIE_MARGIN: z.coerce.number().min(0).max(1).default(0.05),
  ROUTER_FALLBACK: z.string().default('general'),

  SOURCES_FILE: z.string().default('config/sources.json'),
  SOURCES_ROOT: z.string().default('.'),
  CONFLUENCE_BASE_URL: z.string().url().optional(),
  CONFLUENCE_TOKEN: z.string().optional(),
  SHAREPOINT_SITE_URL: z.string().url().optional(),
  SHAREPOINT_TOKEN: z.string().optional(),
});

export type RagConfig = z.infer<typeof envSchema>;

export function loadRagConfig(env: Env = process.env): RagConfig {
  return parseEnv(envSchema, env, 'rag');
}

let cached: RagConfig | null = null;

export function getRagConfig(): RagConfig {
  if (!cached) {
    cached = loadRagConfig();
  }
  return cached;
}

// ============================================================================
// Sources file
// ============================================================================

const collectionSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, "-" and "_" only'),
  adapter: z.enum(['confluence', 'sharepoint', 'filesystem']),
  /** Directory under SOURCES_ROOT, or "SPACE" / "SPACE/pageId" for Confluence */
  path: z.string().min(1),
  recursive: z.boolean().default(true),
  include: z.string().optional(),
  exclude: z.string().optional(),
  /** 0 disables scheduled syncs */
  intervalMinutes: z.number().int().min(0).default(0),
});

const specialistSchema = z.object({
  tag: z.string().min(1),
  description: z.string().min(1),
  collections: z.array(z.string()).min(1),
  keywords: z.array(z.string()).default([]),
  baseRelevance: z.number().min(0).max(1).default(0),
});

const validRegex = (value: string | undefined) => {
  if (value === undefined) return true;
  try {
    new RegExp(value);
    return true;
  } catch {
    return false;
  }
};

export const sourcesFileSchema = z
  .object({
    collections: z.array(collectionSchema),
    specialists: z.array(specialistSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const names = new Set<string>();
    file.collections.forEach((collection, i) => {
      if (names.has(collection.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['collections', i, 'name'], message: 'duplicate collection' });
      }
      names.add(collection.name);

      for (const key of ['include', 'exclude'] as const) {
        if (!validRegex(collection[key])) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['collections', i, key], message: 'invalid regular expression' });
        }
      }
    });

    const tags = new Set<string>();
    file.specialists.forEach((specialist, i) => {
      if (tags.has(specialist.tag)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['specialists', i, 'tag'], message: 'duplicate tag' });
      }
      tags.add(specialist.tag);

      specialist.collections.forEach((name, j) => {
        if (!names.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['specialists', i, 'collections', j],
            message: `unknown collection "${name}"`,
          });
        }
      });
    });
  });

export type SourcesFile = z.infer<typeof sourcesFileSchema>;
export type CollectionConfig = SourcesFile['collections'][number];
export type SpecialistConfig = SourcesFile['specialists'][number];

export function parseSourcesFile(raw: string, label = 'sources file'): SourcesFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid ${label}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = sourcesFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.') || 'ROOT'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid ${label}:\n${issues}`);
  }
  return parsed.data;
}

export async function loadSourcesFile(path: string): Promise<SourcesFile> {
  return parseSourcesFile(await readFile(path, 'utf8'), path);
}
