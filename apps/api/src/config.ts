/**
 * HTTP server settings from the environment.
 *
 * @module @docpilot/api/config
 */

import { parseEnv, type Env } from '@docpilot/database';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  QUERY_MAX_CONCURRENT: z.coerce.number().int().positive().default(10),
  QUERY_MAX_QUEUE: z.coerce.number().int().min(0).default(30),
  QUERY_QUEUE_TIMEOUT_MS: z.coerce.number().int().min(0).default(60000),
  INGEST_RUN_ON_START: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export type ApiConfig = z.infer<typeof envSchema>;

export function loadApiConfig(env: Env = process.env): ApiConfig {
  return parseEnv(envSchema, env, 'api');
}
