/**
 * Access API
 * GET /api/access?user_id=&resource_id=&resource_type=&role=
 */

import { Hono } from 'hono';
import type { RealtimeService } from '../../services/realtime-service.js';
import { MalformedInputError } from '../../core/errors.js';
import { errorResponse } from './utils.js';

function requireQuery(value: string | undefined, name: string): string {
  if (!value) {
    throw new MalformedInputError(`Missing query parameter: ${name}`);
  }
  return value;
}

export function createAccessRouter(service: RealtimeService): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    try {
      const userId = requireQuery(c.req.query('user_id'), 'user_id');
      const resourceId = requireQuery(c.req.query('resource_id'), 'resource_id');
      const resourceType = requireQuery(c.req.query('resource_type'), 'resource_type');
      const role = c.req.query('role') ?? 'viewer';

      const allowed = await service.access.hasAccess(userId, resourceId, resourceType, role);
      return c.json({
        user_id: userId,
        resource_id: resourceId,
        resource_type: resourceType,
        role,
        allowed
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}
