/**
 * Access Resolver
 * Decides whether a principal holds at least a given role on a resource by
 * walking the resource tree until a grant, an ownership match or the root.
 */

import { z } from 'zod';
import { MalformedInputError } from './errors.js';
import type { RoleRepo, UpsertRoleInput } from './role-repo.js';
import {
  MAX_TREE_DEPTH,
  RESOURCE_TREE,
  formatRef,
  type ResourceGraph,
  type ResourceRef
} from './resource-tree.js';
import {
  ROLE_RANK,
  ResourceKindSchema,
  RoleTypeSchema,
  type ResourceKind,
  type Role,
  type RoleFilter,
  type RoleType
} from './types.js';

const IdSchema = z.string().uuid();

export interface AccessResolverOptions {
  debug?: boolean;
}

export function isRoleSufficient(assigned: RoleType, minimum: RoleType): boolean {
  return ROLE_RANK[assigned] >= ROLE_RANK[minimum];
}

export class AccessResolver {
  private readonly debug: boolean;

  constructor(
    private readonly roles: RoleRepo,
    private readonly graph: ResourceGraph,
    options: AccessResolverOptions = {}
  ) {
    this.debug = options.debug ?? process.env.NOTES_RT_DEBUG === 'true';
  }

  /**
   * First match wins: admin marker, self user resource, then per tree node
   * a direct grant, note ownership, or the parent.
   */
  async hasAccess(
    principal: string,
    resourceId: string,
    resourceType: ResourceKind | string,
    minRole: RoleType | string
  ): Promise<boolean> {
    const userId = this.parseId(principal, 'principal');
    const kind = this.parseKind(resourceType);
    const minimum = this.parseRole(minRole);
    const id = this.parseId(resourceId, 'resource id');

    if (await this.roles.hasAdminRole(userId)) {
      this.log(`${userId} is a system admin`);
      return true;
    }

    if (kind === 'user' && id === userId) {
      return true;
    }

    let node: ResourceRef | null = { kind, id };
    for (let depth = 0; node && depth <= MAX_TREE_DEPTH; depth++) {
      const grant = await this.roles.findRole(userId, node.id, node.kind);
      if (grant) {
        const sufficient = isRoleSufficient(grant.role, minimum);
        this.log(`${userId} has ${grant.role} on ${formatRef(node)} (need ${minimum}): ${sufficient}`);
        return sufficient;
      }

      if (RESOURCE_TREE[node.kind].ownershipGrants) {
        const owner = await this.graph.ownerOf(node);
        if (owner === userId) {
          this.log(`${userId} owns ${formatRef(node)}`);
          return true;
        }
      }

      node = await this.graph.parentOf(node);
    }

    this.log(`${userId} has no path to ${kind}:${id}`);
    return false;
  }

  /**
   * Upsert the grant for (principal, resource, type)
   */
  async assignRole(
    principal: string,
    resourceId: string,
    resourceType: ResourceKind | string,
    role: RoleType | string
  ): Promise<Role> {
    const input: UpsertRoleInput = {
      userId: this.parseId(principal, 'principal'),
      resourceId: this.parseId(resourceId, 'resource id'),
      resourceType: this.parseKind(resourceType),
      role: this.parseRole(role)
    };
    return this.roles.upsertRole(input);
  }

  async getRole(
    principal: string,
    resourceId: string,
    resourceType: ResourceKind | string
  ): Promise<Role | null> {
    return this.roles.findRole(
      this.parseId(principal, 'principal'),
      this.parseId(resourceId, 'resource id'),
      this.parseKind(resourceType)
    );
  }

  async getRoleById(roleId: string): Promise<Role | null> {
    return this.roles.findById(this.parseId(roleId, 'role id'));
  }

  async listRoles(filter: RoleFilter = {}): Promise<Role[]> {
    return this.roles.listRoles(filter);
  }

  async removeRole(roleId: string): Promise<boolean> {
    return this.roles.deleteRole(this.parseId(roleId, 'role id'));
  }

  async isSystemAdmin(principal: string): Promise<boolean> {
    return this.roles.hasAdminRole(this.parseId(principal, 'principal'));
  }

  private parseId(value: string, label: string): string {
    const result = IdSchema.safeParse(value);
    if (!result.success) {
      throw new MalformedInputError(`Invalid ${label}: ${value}`);
    }
    return result.data;
  }

  private parseKind(value: string): ResourceKind {
    const result = ResourceKindSchema.safeParse(value);
    if (!result.success) {
      throw new MalformedInputError(`Unknown resource type: ${value}`);
    }
    return result.data;
  }

  private parseRole(value: string): RoleType {
    const result = RoleTypeSchema.safeParse(value);
    if (!result.success) {
      throw new MalformedInputError(`Unknown role: ${value}`);
    }
    return result.data;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[AccessResolver] ${message}`);
    }
  }
}
