/**
 * Services the routes depend on. `bootstrap.ts` builds the production set;
 * tests pass in-process stand-ins.
 *
 * @module @docpilot/api/services
 */

import type {
  ComponentHealth,
  ConcurrencyLimiter,
  IngestionCoordinator,
  RAGPipeline,
  SupervisorRouter,
} from '@docpilot/rag';
import type { ChangelogAnalyzer, FollowUpDetector, FollowUpNotifier, TicketTracker } from '@docpilot/tickets';

export interface HealthReport {
  healthy: boolean;
  components: Record<string, ComponentHealth>;
}

export type QueryEngine = Pick<RAGPipeline, 'answer' | 'answerStream'>;

export type QueryRouter = Pick<SupervisorRouter, 'route' | 'routeStream'>;

export interface Services {
  coordinator: IngestionCoordinator;
  query: QueryEngine;
  /** Collections searched when a query names none */
  collections: string[];
  router: QueryRouter;
  /** Throttle for the model-backed routes */
  queryLimiter: ConcurrencyLimiter;
  tickets: {
    /** Null when no tracker is configured */
    tracker: TicketTracker | null;
    analyzer: ChangelogAnalyzer;
    followUps: FollowUpDetector;
    notifier: FollowUpNotifier | null;
    /** Default search for team reports */
    teamQuery: string;
  };
  health(): Promise<HealthReport>;
}
