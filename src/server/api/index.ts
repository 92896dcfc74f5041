/**
 * API Router
 * Central router for all API endpoints
 */

import { Hono } from 'hono';
import type { RealtimeService } from '../../services/realtime-service.js';
import { createHealthRouter } from './health.js';
import { createOutboxRouter } from './outbox.js';
import { createRolesRouter } from './roles.js';
import { createAccessRouter } from './access.js';

export function createApiRouter(service: RealtimeService): Hono {
  const router = new Hono();

  router.route('/health', createHealthRouter(service));
  router.route('/outbox', createOutboxRouter(service));
  router.route('/roles', createRolesRouter(service));
  router.route('/access', createAccessRouter(service));

  return router;
}
