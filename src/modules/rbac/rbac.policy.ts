import type { Action, ActionPolicy } from './rbac.types.js';

export const ACTION_POLICIES: Record<Action, ActionPolicy> = {
  'tenant:read': { minimumRole: 'viewer' },
  'profile:read': { minimumRole: 'viewer' },

  'project:list': { minimumRole: 'viewer' },
  'project:read': { minimumRole: 'viewer' },
  'project:create': { minimumRole: 'member' },
  'project:update': { minimumRole: 'member' },
  'project:delete': { minimumRole: 'admin', selfOrAbove: true, ownerMinimumRole: 'member' },

  'resource:list': { minimumRole: 'viewer' },
  'resource:read': { minimumRole: 'viewer' },
  'resource:create': { minimumRole: 'member' },
  'resource:update': { minimumRole: 'member' },
  'resource:delete': { minimumRole: 'member' },

  'user:list': { minimumRole: 'member' },
  'user:read': { minimumRole: 'member', selfOrAbove: true },
  'user:create': { minimumRole: 'admin' },
  'user:update': { minimumRole: 'admin', selfOrAbove: true },
  'user:change-role': { minimumRole: 'admin', guardsLastAdmin: true },
  'user:delete': { minimumRole: 'admin', guardsLastAdmin: true },
};
