/**
 * Store health for `/api/health`. A store is healthy when it answers within
 * the timeout and holds what docpilot writes to: the chunk collection in
 * Milvus, the ledger tables in Postgres.
 *
 * @module @docpilot/database/health
 */

import type { MilvusClient } from '@zilliz/milvus2-sdk-node';
import { getTableName } from 'drizzle-orm';
import type postgres from 'postgres';
import { withTimeout } from '../retry/index';
import { followUpCandidates, ingestionRecords } from '../schema/postgres';

export interface StoreHealth {
  healthy: boolean;
  latencyMs: number;
  message?: string;
}

export interface HealthStatus {
  milvus: StoreHealth;
  postgres: StoreHealth;
  healthy: boolean;
}

export type MilvusHealthClient = Pick<MilvusClient, 'checkHealth' | 'hasCollection'>;

export interface HealthCheckClients {
  milvus: MilvusHealthClient | null;
  postgres: ReturnType<typeof postgres> | null;
}

export interface HealthCheckOptions {
  collection: string;
  timeoutMs: number;
}

const DEFAULT_OPTIONS: HealthCheckOptions = {
  collection: 'document_chunks',
  timeoutMs: 5000,
};

export const REQUIRED_TABLES = [getTableName(ingestionRecords), getTableName(followUpCandidates)];

async function timedCheck(
  label: string,
  timeoutMs: number,
  check: () => Promise<string | undefined>
): Promise<StoreHealth> {
  const start = Date.now();
  try {
    const problem = await withTimeout(() => check(), timeoutMs, `${label} health check`);
    const latencyMs = Date.now() - start;
    return problem === undefined ? { healthy: true, latencyMs } : { healthy: false, latencyMs, message: problem };
  } catch (error) {
    return {
      healthy: false,
      latencyMs: Date.now() - start,
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Connectivity only; used when (re)connecting, before the collection exists
 */
export const isMilvusReachable = async (client: Pick<MilvusClient, 'checkHealth'>): Promise<boolean> => {
  try {
    return (await client.checkHealth()).isHealthy;
  } catch (error) {
    console.warn('Milvus health check failed:', error instanceof Error ? error.message : String(error));
    return false;
  }
};

export const checkMilvusHealth = async (
  client: MilvusHealthClient | null,
  options: Partial<HealthCheckOptions> = {}
): Promise<StoreHealth> => {
  if (!client) return { healthy: false, latencyMs: 0, message: 'Milvus client not connected' };
  const { collection, timeoutMs } = { ...DEFAULT_OPTIONS, ...options };

  return timedCheck('Milvus', timeoutMs, async () => {
    const health = await client.checkHealth();
    if (!health.isHealthy) return 'Milvus reports unhealthy';
    const exists = await client.hasCollection({ collection_name: collection });
    return exists.value ? undefined : `Collection "${collection}" does not exist`;
  });
};

export const checkPostgresHealth = async (
  client: ReturnType<typeof postgres> | null,
  options: Partial<HealthCheckOptions> = {}
): Promise<StoreHealth> => {
  if (!client) return { healthy: false, latencyMs: 0, message: 'Postgres client not connected' };
  const { timeoutMs } = { ...DEFAULT_OPTIONS, ...options };

  return timedCheck('Postgres', timeoutMs, async () => {
    const rows = await client`SELECT table_name FROM information_schema.tables WHERE table_schema = 'public'`;
    const present = new Set(rows.map((row) => String(row.table_name)));
    const missing = REQUIRED_TABLES.filter((table) => !present.has(table));
    return missing.length === 0 ? undefined : `Missing tables: ${missing.join(', ')} (run the migrations)`;
  });
};

export const healthCheck = async (
  clients: HealthCheckClients,
  options: Partial<HealthCheckOptions> = {}
): Promise<HealthStatus> => {
  const [milvus, postgres] = await Promise.all([
    checkMilvusHealth(clients.milvus, options),
    checkPostgresHealth(clients.postgres, options),
  ]);

  return {
    milvus,
    postgres,
    healthy: milvus.healthy && postgres.healthy,
  };
};
