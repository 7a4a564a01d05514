import { and, count, eq } from 'drizzle-orm';
import { z } from 'zod';

import { users, type UserRow } from './identity.schema.js';
import type { Identity, Role } from './identity.types.js';
import type { Database } from '../../shared/database/client.js';

const uuidSchema = z.string().uuid();

export type RoleChangeResult =
  | { status: 'updated'; identity: Identity }
  | { status: 'not_found' }
  | { status: 'last_admin' };

export interface RemovalResult {
  status: 'removed' | 'not_found' | 'last_admin';
}

/**
 * Every method is scoped to a tenant; a subject id from another tenant is
 * simply not found.
 *
 * `updateRole` and `removeIdentity` never leave a tenant without an active
 * admin: a write that would is refused with `last_admin`, whatever ran
 * concurrently.
 */
export interface IdentityRepository {
  findIdentity(tenantId: string, subjectId: string): Promise<Identity | null>;
  findRole(tenantId: string, subjectId: string): Promise<Role | null>;
  countAdminsInTenant(tenantId: string): Promise<number>;
  updateRole(tenantId: string, subjectId: string, role: Role): Promise<RoleChangeResult>;
  removeIdentity(tenantId: string, subjectId: string): Promise<RemovalResult>;
}

function toIdentity(row: UserRow): Identity {
  return { subjectId: row.id, tenantId: row.tenantId, role: row.role };
}

function isUuidPair(tenantId: string, subjectId: string): boolean {
  return uuidSchema.safeParse(tenantId).success && uuidSchema.safeParse(subjectId).success;
}

/** Whether taking the admin role away from `target` leaves the tenant with none */
export function strandsTenant(
  target: Pick<UserRow, 'role' | 'isActive'>,
  activeAdmins: number,
  remainsAdmin: boolean
): boolean {
  return target.role === 'admin' && target.isActive && !remainsAdmin && activeAdmins <= 1;
}

/**
 * Lock the tenant's active admin rows, then the target row. Writers in one
 * tenant queue on the admin rows, so each counts what the previous one left.
 */
async function lockAdminChange(
  tx: Pick<Database, 'select'>,
  tenantId: string,
  subjectId: string
): Promise<{ activeAdmins: number; target: UserRow | undefined }> {
  const admins = await tx
    .select({ id: users.id })
    .from(users)
    .where(and(eq(users.tenantId, tenantId), eq(users.role, 'admin'), eq(users.isActive, true)))
    .orderBy(users.id)
    .for('update');

  const [target] = await tx
    .select()
    .from(users)
    .where(and(eq(users.id, subjectId), eq(users.tenantId, tenantId)))
    .for('update');

  return { activeAdmins: admins.length, target };
}

export function createIdentityRepository(db: Database): IdentityRepository {
  async function findIdentity(tenantId: string, subjectId: string): Promise<Identity | null> {
    if (!isUuidPair(tenantId, subjectId)) {
      return null;
    }
    const result = await db
      .select()
      .from(users)
      .where(and(eq(users.id, subjectId), eq(users.tenantId, tenantId), eq(users.isActive, true)));
    return result[0] ? toIdentity(result[0]) : null;
  }

  return {
    findIdentity,

    async findRole(tenantId: string, subjectId: string): Promise<Role | null> {
      const identity = await findIdentity(tenantId, subjectId);
      return identity?.role ?? null;
    },

    async countAdminsInTenant(tenantId: string): Promise<number> {
      const result = await db
        .select({ value: count() })
        .from(users)
        .where(
          and(eq(users.tenantId, tenantId), eq(users.role, 'admin'), eq(users.isActive, true))
        );
      return result[0]?.value ?? 0;
    },

    async updateRole(tenantId: string, subjectId: string, role: Role): Promise<RoleChangeResult> {
      if (!isUuidPair(tenantId, subjectId)) {
        return { status: 'not_found' };
      }

      return db.transaction(async (tx): Promise<RoleChangeResult> => {
        const { activeAdmins, target } = await lockAdminChange(tx, tenantId, subjectId);
        if (!target) {
          return { status: 'not_found' };
        }
        if (strandsTenant(target, activeAdmins, role === 'admin')) {
          return { status: 'last_admin' };
        }

        const [updated] = await tx
          .update(users)
          .set({ role })
          .where(and(eq(users.id, subjectId), eq(users.tenantId, tenantId)))
          .returning();
        return updated
          ? { status: 'updated', identity: toIdentity(updated) }
          : { status: 'not_found' };
      });
    },

    async removeIdentity(tenantId: string, subjectId: string): Promise<RemovalResult> {
      if (!isUuidPair(tenantId, subjectId)) {
        return { status: 'not_found' };
      }

      return db.transaction(async (tx): Promise<RemovalResult> => {
        const { activeAdmins, target } = await lockAdminChange(tx, tenantId, subjectId);
        if (!target) {
          return { status: 'not_found' };
        }
        if (strandsTenant(target, activeAdmins, false)) {
          return { status: 'last_admin' };
        }

        await tx
          .delete(users)
          .where(and(eq(users.id, subjectId), eq(users.tenantId, tenantId)));
        return { status: 'removed' };
      });
    },
  };
}
