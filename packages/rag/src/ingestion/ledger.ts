/**
 * Ingestion Ledger
 *
 * Durable record of what was ingested per (collection, path). Backed by the
 * `ingestion_records` table; any driver failure surfaces as `LedgerError`,
 * which stops the whole ingestion run.
 *
 * @module @docpilot/rag/ingestion/ledger
 */

import {
  and,
  eq,
  postgresSchema,
  type IngestionRecordRow,
  type PostgresDb,
} from '@docpilot/database';
import { LedgerError, errorMessage } from '../errors';
import type { IngestionRecord } from '../types';

export interface IngestionLedger {
  get(collection: string, path: string): Promise<IngestionRecord | null>;
  list(collection: string): Promise<IngestionRecord[]>;
  /** Insert or replace the record */
  save(record: IngestionRecord): Promise<void>;
  /** Note a failed attempt on an existing record; no-op when there is none */
  recordFailure(collection: string, path: string, message: string, at: Date): Promise<void>;
  delete(collection: string, path: string): Promise<void>;
}

const { ingestionRecords } = postgresSchema;

function toRecord(row: IngestionRecordRow): IngestionRecord {
  return {
    collection: row.collection,
    path: row.path,
    contentHash: row.contentHash,
    version: row.version,
    title: row.title,
    url: row.url,
    chunkCount: row.chunkCount,
    lastSuccessAt: row.lastSuccessAt,
    lastAttemptAt: row.lastAttemptAt,
    lastError: row.lastError,
  };
}

export class PostgresIngestionLedger implements IngestionLedger {
  constructor(private readonly db: PostgresDb) {}

  async get(collection: string, path: string): Promise<IngestionRecord | null> {
    const rows = await this.run('read', () =>
      this.db
        .select()
        .from(ingestionRecords)
        .where(and(eq(ingestionRecords.collection, collection), eq(ingestionRecords.path, path)))
        .limit(1)
    );
    return rows[0] ? toRecord(rows[0]) : null;
  }

  async list(collection: string): Promise<IngestionRecord[]> {
    const rows = await this.run('list', () =>
      this.db.select().from(ingestionRecords).where(eq(ingestionRecords.collection, collection))
    );
    return rows.map(toRecord);
  }

  async save(record: IngestionRecord): Promise<void> {
    const values = {
      contentHash: record.contentHash,
      version: record.version,
      title: record.title,
      url: record.url,
      chunkCount: record.chunkCount,
      lastSuccessAt: record.lastSuccessAt,
      lastAttemptAt: record.lastAttemptAt,
      lastError: record.lastError,
    };

    await this.run('write', () =>
      this.db
        .insert(ingestionRecords)
        .values({ collection: record.collection, path: record.path, ...values })
        .onConflictDoUpdate({
          target: [ingestionRecords.collection, ingestionRecords.path],
          set: values,
        })
    );
  }

  async recordFailure(collection: string, path: string, message: string, at: Date): Promise<void> {
    await this.run('write', () =>
      this.db
        .update(ingestionRecords)
        .set({ lastError: message, lastAttemptAt: at })
        .where(and(eq(ingestionRecords.collection, collection), eq(ingestionRecords.path, path)))
    );
  }

  async delete(collection: string, path: string): Promise<void> {
    await this.run('delete', () =>
      this.db
        .delete(ingestionRecords)
        .where(and(eq(ingestionRecords.collection, collection), eq(ingestionRecords.path, path)))
    );
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new LedgerError(`Ingestion ledger ${operation} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
