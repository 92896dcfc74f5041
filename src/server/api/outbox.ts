/**
 * Outbox API
 * Backlog inspection and manual flush
 */

import { Hono } from 'hono';
import type { RealtimeService } from '../../services/realtime-service.js';
import { errorResponse, parseLimit } from './utils.js';

export function createOutboxRouter(service: RealtimeService): Hono {
  const router = new Hono();

  // GET /api/outbox - stats plus events, pending by default
  router.get('/', async (c) => {
    try {
      const dispatchedParam = c.req.query('dispatched');
      const events = await service.store.outbox.listEvents({
        entity: c.req.query('entity'),
        eventType: c.req.query('type'),
        dispatched: dispatchedParam === undefined ? false : dispatchedParam === 'true',
        limit: parseLimit(c.req.query('limit'), 100)
      });
      const status = await service.getStatus();

      return c.json({
        metrics: status.outbox,
        dispatcher: status.dispatcher,
        events: events.map(e => ({
          id: e.id,
          eventType: e.eventType,
          entity: e.entity,
          operation: e.operation,
          actorId: e.actorId,
          timestamp: e.timestamp.toISOString(),
          status: e.status,
          dispatchedAt: e.dispatchedAt?.toISOString() ?? null,
          payload: e.payload
        }))
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // POST /api/outbox/flush - dispatch until the outbox stays empty
  router.post('/flush', async (c) => {
    try {
      const result = await service.settle();
      return c.json(result);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}
