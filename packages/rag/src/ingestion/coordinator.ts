/**
 * Ingestion Coordinator
 *
 * Starts, cancels and reports ingestion runs per configured collection. The
 * lock registry guarantees one run per collection; the lease is released when
 * the run settles, whatever the outcome. A run still alive in this process
 * holds its collection even after its lease expired.
 *
 * @module @docpilot/rag/ingestion/coordinator
 */

import { randomUUID } from 'node:crypto';
import { CollectionLockRegistry } from '../concurrency/locks';
import { IngestionInProgressError, IngestionRunError, UnknownCollectionError, errorMessage } from '../errors';
import type { IngestionReport, SourceConfig } from '../types';
import type { SyncOptions } from './pipeline';

export interface Syncable {
  sync(collection: string, source: SourceConfig, options?: SyncOptions): Promise<IngestionReport>;
}

export interface CollectionBinding {
  collection: string;
  source: SourceConfig;
  pipeline: Syncable;
}

/** How a run ended; `report` is missing only when nothing was processed */
export type IngestionRunOutcome =
  | { ok: true; report: IngestionReport }
  | { ok: false; error: string; report?: IngestionReport };

export interface IngestionRun {
  runId: string;
  collection: string;
  owner: string;
  startedAt: Date;
  /** Settles when the run ends; never rejects */
  done: Promise<IngestionRunOutcome>;
}

export interface CollectionStatus {
  collection: string;
  running: boolean;
  runId?: string;
  owner?: string;
  startedAt?: Date;
  lastOutcome?: IngestionRunOutcome;
  lastFinishedAt?: Date;
}

interface ActiveRun {
  run: IngestionRun;
  controller: AbortController;
}

export class IngestionCoordinator {
  private bindings = new Map<string, CollectionBinding>();
  private locks: CollectionLockRegistry;
  private active = new Map<string, ActiveRun>();
  private history = new Map<string, { outcome: IngestionRunOutcome; finishedAt: Date }>();

  constructor(bindings: CollectionBinding[], locks: CollectionLockRegistry = new CollectionLockRegistry()) {
    for (const binding of bindings) {
      this.bindings.set(binding.collection, binding);
    }
    this.locks = locks;
  }

  get collections(): string[] {
    return [...this.bindings.keys()];
  }

  /**
   * Start a run in the background
   *
   * @throws UnknownCollectionError for a collection that is not configured
   * @throws IngestionInProgressError while another run holds the collection
   */
  trigger(collection: string, owner = 'api'): IngestionRun {
    const binding = this.bindings.get(collection);
    if (!binding) throw new UnknownCollectionError(collection);

    const running = this.active.get(collection);
    if (running) {
      throw new IngestionInProgressError(collection, `${running.run.owner}:${running.run.runId}`);
    }

    const runId = randomUUID();
    const lease = this.locks.tryAcquire(collection, `${owner}:${runId}`);
    if (!lease) {
      throw new IngestionInProgressError(collection, this.locks.holder(collection)?.owner ?? 'unknown');
    }

    const controller = new AbortController();
    console.log(`[ingest] ${collection}: run ${runId} started by ${owner}`);

    const done = binding.pipeline
      .sync(collection, binding.source, { signal: controller.signal })
      .then(
        (report): IngestionRunOutcome => ({ ok: true, report }),
        (error: unknown): IngestionRunOutcome => {
          console.error(`[ingest] ${collection}: run ${runId} failed: ${errorMessage(error)}`);
          return {
            ok: false,
            error: errorMessage(error),
            report: error instanceof IngestionRunError ? error.report : undefined,
          };
        }
      )
      .then((outcome) => {
        this.locks.release(lease);
        if (this.active.get(collection)?.run.runId === runId) this.active.delete(collection);
        this.history.set(collection, { outcome, finishedAt: new Date() });
        return outcome;
      });

    const run: IngestionRun = { runId, collection, owner, startedAt: lease.acquiredAt, done };
    this.active.set(collection, { run, controller });
    return run;
  }

  /**
   * Ask the running sync to stop dispatching documents. Resolves false when
   * nothing was running.
   */
  cancel(collection: string): boolean {
    const active = this.active.get(collection);
    if (!active) return false;

    console.log(`[ingest] ${collection}: cancelling run ${active.run.runId}`);
    active.controller.abort();
    return true;
  }

  isRunning(collection: string): boolean {
    return this.active.has(collection) || this.locks.isLocked(collection);
  }

  status(collection: string): CollectionStatus {
    if (!this.bindings.has(collection)) throw new UnknownCollectionError(collection);

    const active = this.active.get(collection)?.run;
    const last = this.history.get(collection);
    return {
      collection,
      running: active !== undefined,
      runId: active?.runId,
      owner: active?.owner,
      startedAt: active?.startedAt,
      lastOutcome: last?.outcome,
      lastFinishedAt: last?.finishedAt,
    };
  }

  statusAll(): CollectionStatus[] {
    return this.collections.map((collection) => this.status(collection));
  }

  /**
   * Cancel every run and wait for all of them to settle
   */
  async shutdown(): Promise<void> {
    const runs = [...this.active.values()];
    for (const { controller } of runs) controller.abort();
    await Promise.all(runs.map(({ run }) => run.done));
  }
}
