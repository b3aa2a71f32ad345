/**
 * Health Check Routes
 *
 * - GET /api/health - every component, 503 when one is down
 * - GET /api/health/live - liveness check
 *
 * @module @docpilot/api/routes/health
 */

import { Hono } from 'hono';
import type { Services } from '../services';

export function healthRoutes(services: Pick<Services, 'health'>): Hono {
  const health = new Hono();

  health.get('/', async (c) => {
    const report = await services.health();
    return c.json(
      { status: report.healthy ? 'healthy' : 'unhealthy', timestamp: new Date().toISOString(), ...report },
      report.healthy ? 200 : 503
    );
  });

  health.get('/live', (c) => c.json({ status: 'alive' }));

  return health;
}
