/**
 * Roles API
 * Grant, list and revoke roles. Granting or revoking requires owner on the resource.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { RealtimeService } from '../../services/realtime-service.js';
import { MalformedInputError, NotFoundError, UnauthorizedError } from '../../core/errors.js';
import { ResourceKindSchema, RoleTypeSchema, type Role, type RoleFilter } from '../../core/types.js';
import { errorResponse, readJsonBody, requireCaller } from './utils.js';

const AssignRoleBodySchema = z.object({
  user_id: z.string(),
  resource_id: z.string(),
  resource_type: ResourceKindSchema,
  role: RoleTypeSchema
});

function serializeRole(role: Role) {
  return {
    id: role.id,
    user_id: role.userId,
    resource_id: role.resourceId,
    resource_type: role.resourceType,
    role: role.role,
    created_at: role.createdAt.toISOString(),
    updated_at: role.updatedAt.toISOString()
  };
}

export function createRolesRouter(service: RealtimeService): Hono {
  const router = new Hono();
  const access = service.access;

  // GET /api/roles - the caller's roles; admins may filter freely
  router.get('/', async (c) => {
    try {
      const caller = requireCaller(c);
      const resourceType = c.req.query('resource_type');
      const role = c.req.query('role');

      const filter: RoleFilter = {
        userId: c.req.query('user_id'),
        resourceId: c.req.query('resource_id'),
        resourceType: resourceType === undefined ? undefined : ResourceKindSchema.parse(resourceType),
        role: role === undefined ? undefined : RoleTypeSchema.parse(role)
      };

      if (!(await access.isSystemAdmin(caller))) {
        filter.userId = caller;
      }

      const roles = await access.listRoles(filter);
      return c.json({ roles: roles.map(serializeRole) });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return errorResponse(c, new MalformedInputError(error.issues[0]?.message ?? 'Invalid filter'));
      }
      return errorResponse(c, error);
    }
  });

  // POST /api/roles - upsert a grant
  router.post('/', async (c) => {
    try {
      const caller = requireCaller(c);
      const parsed = AssignRoleBodySchema.safeParse(await readJsonBody(c));
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new MalformedInputError(issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid body');
      }

      const body = parsed.data;
      if (!(await access.hasAccess(caller, body.resource_id, body.resource_type, 'owner'))) {
        throw new UnauthorizedError(`User ${caller} may not grant roles on ${body.resource_type} ${body.resource_id}`);
      }

      const role = await access.assignRole(body.user_id, body.resource_id, body.resource_type, body.role);
      return c.json({ role: serializeRole(role) }, 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // DELETE /api/roles/:id
  router.delete('/:id', async (c) => {
    try {
      const caller = requireCaller(c);
      const roleId = c.req.param('id');

      const role = await access.getRoleById(roleId);
      if (!role) {
        throw new NotFoundError('role', roleId);
      }
      if (!(await access.hasAccess(caller, role.resourceId, role.resourceType, 'owner'))) {
        throw new UnauthorizedError(`User ${caller} may not revoke roles on ${role.resourceType} ${role.resourceId}`);
      }

      await access.removeRole(role.id);
      return c.json({ deleted: true, id: role.id });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}
