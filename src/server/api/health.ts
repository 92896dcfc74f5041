/**
 * Health API
 * Operational health including outbox backlog
 */

import { Hono } from 'hono';
import type { RealtimeService } from '../../services/realtime-service.js';
import { errorResponse } from './utils.js';

/** Pending rows older than this mean the bus has been unreachable for a while */
export const STALE_BACKLOG_MS = 60_000;

export function createHealthRouter(service: RealtimeService): Hono {
  const router = new Hono();

  // GET /api/health
  router.get('/', async (c) => {
    try {
      const status = await service.getStatus();
      const stale = status.outbox.oldestPendingAge !== null
        && status.outbox.oldestPendingAge > STALE_BACKLOG_MS;

      return c.json({
        status: stale || status.dispatcher.status === 'error' ? 'needs-attention' : 'ok',
        timestamp: new Date().toISOString(),
        outbox: status.outbox,
        dispatcher: status.dispatcher,
        synchronizer: status.synchronizer,
        hub: status.hub
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}
