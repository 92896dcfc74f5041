/**
 * Role Repository - grant rows keyed by (user, resource, resource type)
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  sqliteAll,
  sqliteExec,
  sqliteGet,
  sqliteRun,
  sqliteTransaction,
  toDateFromSQLite,
  toSQLiteTimestamp,
  type SQLiteDatabase,
  type SQLiteParam
} from './sqlite-wrapper.js';
import {
  ResourceKindSchema,
  RoleTypeSchema,
  type ResourceKind,
  type Role,
  type RoleFilter,
  type RoleType
} from './types.js';

export interface UpsertRoleInput {
  userId: string;
  resourceId: string;
  resourceType: ResourceKind;
  role: RoleType;
}

const RoleRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  resource_id: z.string(),
  resource_type: ResourceKindSchema,
  role: RoleTypeSchema,
  created_at: z.string(),
  updated_at: z.string()
});

export const ROLE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS roles (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    resource_id TEXT NOT NULL,
    resource_type TEXT NOT NULL,
    role TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (user_id, resource_id, resource_type)
  );

  CREATE INDEX IF NOT EXISTS idx_roles_resource ON roles(resource_type, resource_id);
`;

export class RoleRepo {
  constructor(private readonly db: SQLiteDatabase) {}

  ensureSchema(): void {
    sqliteExec(this.db, ROLE_SCHEMA);
  }

  async findRole(userId: string, resourceId: string, resourceType: ResourceKind): Promise<Role | null> {
    return this.findRoleSync(userId, resourceId, resourceType);
  }

  async findById(roleId: string): Promise<Role | null> {
    const row = sqliteGet(this.db, `SELECT * FROM roles WHERE id = ?`, [roleId]);
    return row === undefined ? null : this.rowToRole(row);
  }

  /**
   * True if the user holds the system admin marker
   */
  async hasAdminRole(userId: string): Promise<boolean> {
    const row = sqliteGet(
      this.db,
      `SELECT id FROM roles WHERE user_id = ? AND resource_type = 'user' AND role = 'admin' LIMIT 1`,
      [userId]
    );
    return row !== undefined;
  }

  /**
   * Insert or update the single row for (user, resource, type).
   * Runs read-then-write in one transaction.
   */
  async upsertRole(input: UpsertRoleInput): Promise<Role> {
    return sqliteTransaction(this.db, () => this.upsertRoleSync(input));
  }

  /**
   * Synchronous upsert for callers already inside a transaction
   */
  upsertRoleSync(input: UpsertRoleInput): Role {
    const now = new Date();
    const existing = this.findRoleSync(input.userId, input.resourceId, input.resourceType);

    if (existing) {
      if (existing.role !== input.role) {
        sqliteRun(
          this.db,
          `UPDATE roles SET role = ?, updated_at = ? WHERE id = ?`,
          [input.role, toSQLiteTimestamp(now), existing.id]
        );
        return { ...existing, role: input.role, updatedAt: now };
      }
      return existing;
    }

    const role: Role = {
      id: randomUUID(),
      userId: input.userId,
      resourceId: input.resourceId,
      resourceType: input.resourceType,
      role: input.role,
      createdAt: now,
      updatedAt: now
    };

    sqliteRun(
      this.db,
      `INSERT INTO roles (id, user_id, resource_id, resource_type, role, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        role.id,
        role.userId,
        role.resourceId,
        role.resourceType,
        role.role,
        toSQLiteTimestamp(now),
        toSQLiteTimestamp(now)
      ]
    );

    return role;
  }

  async listRoles(filter: RoleFilter = {}): Promise<Role[]> {
    const clauses: string[] = [];
    const params: SQLiteParam[] = [];

    if (filter.userId !== undefined) {
      clauses.push('user_id = ?');
      params.push(filter.userId);
    }
    if (filter.resourceId !== undefined) {
      clauses.push('resource_id = ?');
      params.push(filter.resourceId);
    }
    if (filter.resourceType !== undefined) {
      clauses.push('resource_type = ?');
      params.push(filter.resourceType);
    }
    if (filter.role !== undefined) {
      clauses.push('role = ?');
      params.push(filter.role);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return sqliteAll(
      this.db,
      `SELECT * FROM roles ${where} ORDER BY created_at ASC, rowid ASC`,
      params
    ).map(row => this.rowToRole(row));
  }

  async deleteRole(roleId: string): Promise<boolean> {
    const result = sqliteRun(this.db, `DELETE FROM roles WHERE id = ?`, [roleId]);
    return result.changes > 0;
  }

  /**
   * Remove every grant on a resource. Synchronous so write paths can call it mid-transaction.
   */
  deleteRolesForResource(resourceId: string, resourceType: ResourceKind): number {
    const result = sqliteRun(
      this.db,
      `DELETE FROM roles WHERE resource_id = ? AND resource_type = ?`,
      [resourceId, resourceType]
    );
    return result.changes;
  }

  private findRoleSync(userId: string, resourceId: string, resourceType: ResourceKind): Role | null {
    const row = sqliteGet(
      this.db,
      `SELECT * FROM roles WHERE user_id = ? AND resource_id = ? AND resource_type = ?`,
      [userId, resourceId, resourceType]
    );
    return row === undefined ? null : this.rowToRole(row);
  }

  private rowToRole(raw: unknown): Role {
    const row = RoleRowSchema.parse(raw);
    return {
      id: row.id,
      userId: row.user_id,
      resourceId: row.resource_id,
      resourceType: row.resource_type,
      role: row.role,
      createdAt: toDateFromSQLite(row.created_at),
      updatedAt: toDateFromSQLite(row.updated_at)
    };
  }
}
