import { z } from 'zod';

/** Lowest to highest */
export const ROLES = ['viewer', 'member', 'admin'] as const;

export const roleSchema = z.enum(ROLES);

export type Role = z.infer<typeof roleSchema>;

export const ROLE_RANK: Record<Role, number> = {
  viewer: 1,
  member: 2,
  admin: 3,
};

/**
 * Negative when `a` ranks below `b`, zero when equal, positive above.
 */
export function compareRoles(a: Role, b: Role): number {
  return ROLE_RANK[a] - ROLE_RANK[b];
}

export function hasAtLeastRole(role: Role, minimum: Role): boolean {
  return compareRoles(role, minimum) >= 0;
}

/** A verified caller, as read from token claims */
export interface Identity {
  subjectId: string;
  tenantId: string;
  role: Role;
}
