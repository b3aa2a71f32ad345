/**
 * Ingestion Routes
 *
 * - POST /api/ingest/:collection - start a sync (202), or wait for it with ?wait=true
 * - DELETE /api/ingest/:collection - cancel the running sync
 * - GET /api/ingest/:collection - status of one collection
 * - GET /api/ingest - status of every collection
 *
 * @module @docpilot/api/routes/ingest
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { CollectionStatus, IngestionRunOutcome } from '@docpilot/rag';
import type { Services } from '../services';
import { validate } from '../validation';

const triggerQuerySchema = z.object({
  wait: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

function serializeOutcome(outcome: IngestionRunOutcome) {
  return outcome.ok ? { ok: true, report: outcome.report } : { ok: false, error: outcome.error, report: outcome.report };
}

function serializeStatus(status: CollectionStatus) {
  return {
    collection: status.collection,
    running: status.running,
    runId: status.runId,
    owner: status.owner,
    startedAt: status.startedAt?.toISOString(),
    lastOutcome: status.lastOutcome ? serializeOutcome(status.lastOutcome) : undefined,
    lastFinishedAt: status.lastFinishedAt?.toISOString(),
  };
}

export function ingestRoutes(services: Pick<Services, 'coordinator'>): Hono {
  const ingest = new Hono();
  const { coordinator } = services;

  ingest.post('/:collection', validate('query', triggerQuerySchema), async (c) => {
    const collection = c.req.param('collection');
    const { wait } = c.req.valid('query');

    const run = coordinator.trigger(collection);
    const accepted = {
      runId: run.runId,
      collection: run.collection,
      owner: run.owner,
      startedAt: run.startedAt.toISOString(),
    };

    if (!wait) {
      return c.json(accepted, 202);
    }

    const outcome = await run.done;
    return c.json({ ...accepted, outcome: serializeOutcome(outcome) }, 200);
  });

  ingest.delete('/:collection', (c) => {
    const collection = c.req.param('collection');
    // unknown collections throw here before cancel is attempted
    coordinator.status(collection);
    return c.json({ collection, cancelled: coordinator.cancel(collection) });
  });

  ingest.get('/:collection', (c) => c.json(serializeStatus(coordinator.status(c.req.param('collection')))));

  ingest.get('/', (c) => c.json({ collections: coordinator.statusAll().map(serializeStatus) }));

  return ingest;
}
