/**
 * docpilot API
 *
 * Hono application over a set of services. Routes throw domain errors; the
 * error handler maps them onto JSON error bodies.
 *
 * @module @docpilot/api/app
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { ErrorResponse } from '@docpilot/rag';
import { toErrorResponse } from './errors';
import { healthRoutes } from './routes/health';
import { ingestRoutes } from './routes/ingest';
import { queryRoutes } from './routes/query';
import { routeRoutes } from './routes/route';
import { ticketRoutes } from './routes/tickets';
import type { Services } from './services';

export function createApp(services: Services): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api/health', healthRoutes(services));
  app.route('/api/ingest', ingestRoutes(services));
  app.route('/api/query', queryRoutes(services));
  app.route('/api/route', routeRoutes(services));
  app.route('/api/tickets', ticketRoutes(services));

  app.get('/api', (c) =>
    c.json({
      name: 'docpilot',
      endpoints: {
        health: '/api/health',
        ingest: '/api/ingest',
        query: '/api/query',
        route: '/api/route',
        tickets: '/api/tickets',
      },
    })
  );

  app.notFound((c) => {
    const body: ErrorResponse = { error: 'NOT_FOUND', message: `Route ${c.req.method} ${c.req.path} not found` };
    return c.json(body, 404);
  });

  app.onError((err, c) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      console.error(`[api] ${c.req.method} ${c.req.path} failed: ${err.message}`);
    }
    return c.json(body, status);
  });

  return app;
}
