/**
 * Periodic re-ingestion. Each scheduled collection is synced every
 * `intervalMinutes`; a tick that finds its collection still running is skipped.
 *
 * @module @docpilot/rag/ingestion/scheduler
 */

import { IngestionInProgressError, errorMessage } from '../errors';
import type { IngestionCoordinator } from './coordinator';

export interface ScheduleEntry {
  collection: string;
  intervalMinutes: number;
}

export interface SchedulerOptions {
  /** Sync every scheduled collection once right after start() */
  runOnStart: boolean;
}

export class IngestScheduler {
  private coordinator: IngestionCoordinator;
  private entries: ScheduleEntry[];
  private options: SchedulerOptions;
  private timers: NodeJS.Timeout[] = [];

  constructor(
    coordinator: IngestionCoordinator,
    entries: ScheduleEntry[],
    options: Partial<SchedulerOptions> = {}
  ) {
    this.coordinator = coordinator;
    this.entries = entries.filter((entry) => entry.intervalMinutes > 0);
    this.options = { runOnStart: false, ...options };
  }

  get running(): boolean {
    return this.timers.length > 0;
  }

  start(): void {
    if (this.running) return;

    for (const entry of this.entries) {
      const timer = setInterval(() => this.tick(entry.collection), entry.intervalMinutes * 60 * 1000);
      timer.unref();
      this.timers.push(timer);
      console.log(`[scheduler] ${entry.collection}: every ${entry.intervalMinutes} min`);

      if (this.options.runOnStart) this.tick(entry.collection);
    }
  }

  /**
   * Trigger one scheduled sync. Returns false when it was skipped.
   */
  tick(collection: string): boolean {
    if (this.coordinator.isRunning(collection)) {
      console.log(`[scheduler] ${collection}: previous run still active, skipping`);
      return false;
    }

    try {
      this.coordinator.trigger(collection, 'scheduler');
      return true;
    } catch (error) {
      if (error instanceof IngestionInProgressError) {
        console.log(`[scheduler] ${collection}: ${error.message}, skipping`);
      } else {
        console.error(`[scheduler] ${collection}: could not start sync: ${errorMessage(error)}`);
      }
      return false;
    }
  }

  /**
   * Stop the timers and cancel running syncs
   */
  async stop(): Promise<void> {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    await this.coordinator.shutdown();
  }
}
