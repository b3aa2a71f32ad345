import type { MilvusClient } from '@zilliz/milvus2-sdk-node';

import { getMilvusClient, closeMilvusClient } from './clients/milvus';
import {
  getPostgresClient,
  getPostgresSql,
  closePostgresClient,
  type PostgresDb,
  type PostgresSql,
} from './clients/postgres';
import { getDatabaseConfig } from './config/index';
import { healthCheck, type HealthCheckOptions, type HealthStatus } from './health/index';

export { initMilvusCollection, DEFAULT_COLLECTION_NAME, type MilvusCollectionOptions } from './schema/milvus';
export * as postgresSchema from './schema/postgres';
export type { IngestionRecordRow, FollowUpCandidateRow } from './schema/postgres';
export {
  withRetry,
  withTimeout,
  sleep,
  isRetryableError,
  AbortError,
  TimeoutError,
  type RetryOptions,
} from './retry/index';
export {
  loadDatabaseConfig,
  getDatabaseConfig,
  parseEnv,
  postgresConnectionString,
  type DatabaseConfig,
  type Env,
} from './config/index';
export {
  checkMilvusHealth,
  checkPostgresHealth,
  healthCheck,
  type HealthCheckOptions,
  type HealthStatus,
  type StoreHealth,
} from './health/index';
export type { PostgresDb } from './clients/postgres';

// Re-export commonly used drizzle-orm operators for query building
export { eq, and, or, not, isNull, isNotNull, gt, gte, lt, lte, ne, inArray, notInArray, sql } from 'drizzle-orm';

export class DatabaseManager {
  private _milvus: MilvusClient | null = null;
  private _postgres: PostgresDb | null = null;
  private _sql: PostgresSql | null = null;
  private _connected = false;

  get milvus(): MilvusClient {
    if (!this._milvus) {
      throw new Error('Milvus client not connected. Call connect() first.');
    }
    return this._milvus;
  }

  get postgres(): PostgresDb {
    if (!this._postgres) {
      throw new Error('Postgres client not connected. Call connect() first.');
    }
    return this._postgres;
  }

  get isConnected(): boolean {
    return this._connected;
  }

  async connect(): Promise<void> {
    if (this._connected) {
      console.log('DatabaseManager already connected.');
      return;
    }

    console.log('DatabaseManager: Connecting to all databases...');

    this._milvus = await getMilvusClient();
    this._sql = getPostgresSql();
    this._postgres = getPostgresClient();
    this._connected = true;

    console.log('DatabaseManager: All databases connected successfully.');
  }

  async disconnect(): Promise<void> {
    if (!this._connected) {
      console.log('DatabaseManager already disconnected.');
      return;
    }

    console.log('DatabaseManager: Disconnecting from all databases...');

    await Promise.all([closeMilvusClient(), closePostgresClient()]);

    this._milvus = null;
    this._postgres = null;
    this._sql = null;
    this._connected = false;

    console.log('DatabaseManager: All databases disconnected.');
  }

  async healthCheck(options: Partial<HealthCheckOptions> = {}): Promise<HealthStatus> {
    return healthCheck(
      { milvus: this._milvus, postgres: this._sql },
      { collection: getDatabaseConfig().MILVUS_COLLECTION, ...options }
    );
  }
}

// Singleton instance - lazy initialized
let instance: DatabaseManager | null = null;

export const getDatabaseManager = (): DatabaseManager => {
  if (!instance) {
    instance = new DatabaseManager();
  }
  return instance;
};

export { DatabaseManager as default };
