import { z } from 'zod';

const envSchema = z.object({
  // Milvus Configuration
  MILVUS_HOST: z.string().default('localhost'),
  MILVUS_PORT: z.string().default('19530'),
  MILVUS_USER: z.string().optional(),
  MILVUS_PASSWORD: z.string().optional(),
  MILVUS_COLLECTION: z.string().default('document_chunks'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),

  // Postgres Configuration
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.string().default('5432'),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().min(1, 'POSTGRES_PASSWORD is required'),
  POSTGRES_DB: z.string().default('docpilot'),

  // App Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type DatabaseConfig = z.infer<typeof envSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Parse an environment object against a zod schema, failing with one line per issue.
 */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  env: Env,
  label = 'environment'
): z.infer<T> {
  const parsed = schema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => {
        const path = issue.path.join('.') || 'ROOT';
        return `  - ${path}: ${issue.message}`;
      })
      .join('\n');

    const message = `Invalid ${label} configuration:\n${issues}`;
    console.error(message);
    throw new Error(message);
  }

  return parsed.data;
}

export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  return parseEnv(envSchema, env, 'database');
}

let cached: DatabaseConfig | null = null;

/**
 * Process-wide configuration, parsed from process.env on first use.
 */
export function getDatabaseConfig(): DatabaseConfig {
  if (!cached) {
    cached = loadDatabaseConfig();
  }
  return cached;
}

export function postgresConnectionString(config: DatabaseConfig): string {
  return `postgres://${config.POSTGRES_USER}:${encodeURIComponent(config.POSTGRES_PASSWORD)}@${config.POSTGRES_HOST}:${config.POSTGRES_PORT}/${config.POSTGRES_DB}`;
}
