import type { Role } from '../identity/identity.types.js';

export const ACTIONS = [
  'tenant:read',
  'profile:read',
  'project:list',
  'project:read',
  'project:create',
  'project:update',
  'project:delete',
  'resource:list',
  'resource:read',
  'resource:create',
  'resource:update',
  'resource:delete',
  'user:list',
  'user:read',
  'user:create',
  'user:update',
  'user:change-role',
  'user:delete',
] as const;

export type Action = (typeof ACTIONS)[number];

export interface ActionPolicy {
  minimumRole: Role;
  /** The owner of the target resource may act even below `minimumRole` */
  selfOrAbove?: boolean;
  /** Lowest role that may use the owner path (defaults to viewer) */
  ownerMinimumRole?: Role;
  /** Removing or demoting the tenant's last admin is refused */
  guardsLastAdmin?: boolean;
}

export interface AuthorizationTarget {
  /**
   * Owner of the resource acted upon. For user actions this is the
   * subject id of the user being read, changed or removed.
   */
  resourceOwnerId?: string;
  /** Role being assigned by `user:change-role` */
  newRole?: Role;
}

export type DenyReason = 'insufficient_role' | 'ownership_mismatch' | 'last_admin_violation';

export type AuthorizationDecision = { allowed: true } | { allowed: false; reason: DenyReason };
