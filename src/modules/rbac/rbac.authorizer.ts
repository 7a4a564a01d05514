import type { Logger } from 'pino';

import { ACTION_POLICIES } from './rbac.policy.js';
import type {
  Action,
  ActionPolicy,
  AuthorizationDecision,
  AuthorizationTarget,
} from './rbac.types.js';
import type { IdentityRepository } from '../identity/identity.repository.js';
import { hasAtLeastRole, type Identity } from '../identity/identity.types.js';
import {
  ForbiddenError,
  LastAdminViolationError,
  type AdmissionError,
} from '../../shared/errors/index.js';
import { withTimeout } from '../../shared/timeout/index.js';

export interface RbacAuthorizerOptions {
  identityRepository: Pick<IdentityRepository, 'findRole' | 'countAdminsInTenant'>;
  logger: Logger;
  timeoutMs: number;
}

export interface RbacAuthorizer {
  authorize(
    identity: Identity,
    action: Action,
    target?: AuthorizationTarget
  ): Promise<AuthorizationDecision>;
}

function checkRole(
  identity: Identity,
  policy: ActionPolicy,
  target: AuthorizationTarget
): AuthorizationDecision {
  if (hasAtLeastRole(identity.role, policy.minimumRole)) {
    return { allowed: true };
  }

  if (!policy.selfOrAbove || target.resourceOwnerId === undefined) {
    return { allowed: false, reason: 'insufficient_role' };
  }

  if (target.resourceOwnerId !== identity.subjectId) {
    return { allowed: false, reason: 'ownership_mismatch' };
  }

  return hasAtLeastRole(identity.role, policy.ownerMinimumRole ?? 'viewer')
    ? { allowed: true }
    : { allowed: false, reason: 'insufficient_role' };
}

/** Whether the action takes the admin role away from its target */
function removesAdmin(action: Action, target: AuthorizationTarget): boolean {
  if (action === 'user:delete') {
    return true;
  }
  return target.newRole !== undefined && target.newRole !== 'admin';
}

export function denialToError(
  action: Action,
  decision: Extract<AuthorizationDecision, { allowed: false }>
): AdmissionError {
  switch (decision.reason) {
    case 'last_admin_violation':
      return new LastAdminViolationError();
    case 'ownership_mismatch':
      return new ForbiddenError('ownership_mismatch', `Only the owner may perform ${action}`);
    case 'insufficient_role':
      return new ForbiddenError(
        'insufficient_role',
        `${action} requires the ${ACTION_POLICIES[action].minimumRole} role or higher`
      );
  }
}

export function createRbacAuthorizer(options: RbacAuthorizerOptions): RbacAuthorizer {
  const { identityRepository, logger, timeoutMs } = options;

  async function violatesLastAdmin(
    identity: Identity,
    action: Action,
    target: AuthorizationTarget
  ): Promise<boolean> {
    if (target.resourceOwnerId === undefined || !removesAdmin(action, target)) {
      return false;
    }

    const targetRole = await withTimeout(
      identityRepository.findRole(identity.tenantId, target.resourceOwnerId),
      timeoutMs,
      'identity role lookup'
    );
    if (targetRole !== 'admin') {
      return false;
    }

    const admins = await withTimeout(
      identityRepository.countAdminsInTenant(identity.tenantId),
      timeoutMs,
      'admin count'
    );
    return admins <= 1;
  }

  return {
    async authorize(identity, action, target = {}) {
      const policy = ACTION_POLICIES[action];
      const decision = checkRole(identity, policy, target);
      if (!decision.allowed) {
        return decision;
      }

      if (policy.guardsLastAdmin && (await violatesLastAdmin(identity, action, target))) {
        logger.info(
          { tenantId: identity.tenantId, subjectId: identity.subjectId, action },
          'Refused to remove the last admin of a tenant'
        );
        return { allowed: false, reason: 'last_admin_violation' };
      }

      return decision;
    },
  };
}
