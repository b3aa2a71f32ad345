/**
 * Ticket Routes
 *
 * - GET /api/tickets/:key/progress - progress report from the ticket's changelog
 * - POST /api/tickets/team-report - aggregate over a tracker search
 * - POST /api/tickets/:key/follow-ups/scan - unanswered questions, optionally reminded
 * - POST /api/tickets/:key/follow-ups/notified - record a reminder sent elsewhere
 *
 * @module @docpilot/api/routes/tickets
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { TicketTracker } from '@docpilot/tickets';
import { HttpError } from '../errors';
import type { Services } from '../services';
import { validate } from '../validation';

// ============================================================================
// Validation Schemas
// ============================================================================

const ticketKeySchema = z.object({
  key: z
    .string()
    .transform((key) => key.toUpperCase())
    .pipe(z.string().regex(/^[A-Z][A-Z0-9]+-\d+$/, 'Expected a ticket key such as ABC-123')),
});

const teamReportSchema = z
  .object({
    query: z.string().min(1).optional(),
    from: z.coerce.date(),
    to: z.coerce.date(),
    bucket: z.enum(['day', 'week']).default('week'),
  })
  .refine((window) => window.from.getTime() < window.to.getTime(), {
    message: '"from" must be before "to"',
    path: ['to'],
  });

const scanSchema = z.object({
  notify: z.boolean().default(false),
  stalenessHours: z.number().positive().optional(),
});

const notifiedSchema = z.object({
  commentId: z.string().min(1),
  mentionedUser: z.string().min(1),
  at: z.coerce.date().optional(),
});

// ============================================================================
// Routes
// ============================================================================

export function ticketRoutes(services: Pick<Services, 'tickets'>): Hono {
  const tickets = new Hono();
  const { analyzer, followUps, notifier, teamQuery } = services.tickets;

  const requireTracker = (): TicketTracker => {
    if (!services.tickets.tracker) {
      throw new HttpError(503, 'TRACKER_NOT_CONFIGURED', 'No ticket tracker is configured');
    }
    return services.tickets.tracker;
  };

  tickets.get('/:key/progress', validate('param', ticketKeySchema), async (c) => {
    const tracker = requireTracker();
    const { key } = c.req.valid('param');

    const ticket = await tracker.fetchTicket(key, c.req.raw.signal);
    return c.json({ ...analyzer.analyze(ticket), url: tracker.ticketUrl(key) });
  });

  tickets.post('/team-report', validate('json', teamReportSchema), async (c) => {
    const tracker = requireTracker();
    const { query, from, to, bucket } = c.req.valid('json');

    const found = await tracker.searchTickets(query ?? teamQuery, c.req.raw.signal);
    return c.json(analyzer.analyzeTeam(found, { from, to, bucket }));
  });

  tickets.post(
    '/:key/follow-ups/scan',
    validate('param', ticketKeySchema),
    validate('json', scanSchema),
    async (c) => {
      const tracker = requireTracker();
      const { key } = c.req.valid('param');
      const { notify, stalenessHours } = c.req.valid('json');

      const ticket = await tracker.fetchTicket(key, c.req.raw.signal);
      const stale = await followUps.scan(
        ticket,
        stalenessHours === undefined ? undefined : stalenessHours * 60 * 60 * 1000
      );

      if (!notify) {
        return c.json({ ticketKey: key, followUps: stale });
      }
      if (!notifier) {
        throw new HttpError(503, 'TRACKER_NOT_CONFIGURED', 'No ticket tracker is configured for reminders');
      }

      const result = await notifier.notify(stale, c.req.raw.signal);
      return c.json({ ticketKey: key, followUps: stale, ...result });
    }
  );

  tickets.post(
    '/:key/follow-ups/notified',
    validate('param', ticketKeySchema),
    validate('json', notifiedSchema),
    async (c) => {
      const { key } = c.req.valid('param');
      const { commentId, mentionedUser, at } = c.req.valid('json');

      const updated = await followUps.markNotified({ ticketKey: key, commentId, mentionedUser }, at);
      if (!updated) {
        throw new HttpError(404, 'FOLLOW_UP_NOT_FOUND', `No follow-up recorded for ${key}/${commentId}/${mentionedUser}`);
      }
      return c.json({ ticketKey: key, commentId, mentionedUser, notified: true });
    }
  );

  return tickets;
}
