import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { roleSchema } from './identity.types.js';
import type { AdmissionContext } from '../admission/admission.types.js';
import type { AuthorizationTarget } from '../rbac/rbac.types.js';
import { LastAdminViolationError } from '../../shared/errors/index.js';

const userParamsSchema = z.object({ id: z.string().min(1) });

const changeRoleSchema = z.object({ role: roleSchema });

interface UserParams {
  id: string;
}

/** The user named in the path is both the target and its own owner */
function userTarget(request: FastifyRequest): AuthorizationTarget {
  const params = userParamsSchema.safeParse(request.params);
  return params.success ? { resourceOwnerId: params.data.id } : {};
}

function roleChangeTarget(request: FastifyRequest): AuthorizationTarget {
  const body = changeRoleSchema.safeParse(request.body);
  return body.success ? { ...userTarget(request), newRole: body.data.role } : userTarget(request);
}

function admittedContext(request: FastifyRequest): AdmissionContext {
  if (!request.admission) {
    throw new Error(`Route ${request.routeOptions.url ?? request.url} is missing app.admission`);
  }
  return request.admission;
}

/** A concurrent write took the tenant down to one admin after admission passed */
function sendLastAdminViolation(
  request: FastifyRequest<{ Params: UserParams }>,
  reply: FastifyReply,
  tenantId: string
): FastifyReply {
  const error = new LastAdminViolationError();
  request.log.info(
    { tenantId, targetId: request.params.id },
    'Refused to remove the last admin of a tenant'
  );
  return reply.status(error.statusCode).send(error.toJSON());
}

// eslint-disable-next-line @typescript-eslint/require-await
export const identityRoutes: FastifyPluginAsync = async (app) => {
  const { identityRepository } = app;

  app.get('/me', { preHandler: app.admission('profile:read') }, async (request, reply) => {
    const { tenant, identity, rateLimit } = admittedContext(request);
    return reply.send({ data: { tenant, identity, rateLimit } });
  });

  app.patch<{ Params: UserParams }>(
    '/users/:id/role',
    { preHandler: app.admission('user:change-role', roleChangeTarget) },
    async (request, reply) => {
      const { identity } = admittedContext(request);
      const parseResult = changeRoleSchema.safeParse(request.body);

      if (!parseResult.success) {
        return reply.status(400).send({
          error: 'Bad Request',
          message: 'Invalid request body',
          details: parseResult.error.flatten(),
        });
      }

      const result = await identityRepository.updateRole(
        identity.tenantId,
        request.params.id,
        parseResult.data.role
      );

      if (result.status === 'last_admin') {
        return sendLastAdminViolation(request, reply, identity.tenantId);
      }

      if (result.status === 'not_found') {
        return reply.status(404).send({
          error: 'Not Found',
          message: 'User not found',
        });
      }

      const updated = result.identity;
      request.log.info(
        { tenantId: identity.tenantId, subjectId: updated.subjectId, role: updated.role },
        'User role changed'
      );
      return reply.send({ data: updated });
    }
  );

  app.delete<{ Params: UserParams }>(
    '/users/:id',
    { preHandler: app.admission('user:delete', userTarget) },
    async (request, reply) => {
      const { identity } = admittedContext(request);

      if (request.params.id === identity.subjectId) {
        return reply.status(400).send({
          error: 'Bad Request',
          message: 'Cannot delete your own account',
        });
      }

      const { status } = await identityRepository.removeIdentity(
        identity.tenantId,
        request.params.id
      );

      if (status === 'last_admin') {
        return sendLastAdminViolation(request, reply, identity.tenantId);
      }

      if (status === 'not_found') {
        return reply.status(404).send({
          error: 'Not Found',
          message: 'User not found',
        });
      }

      request.log.info(
        { tenantId: identity.tenantId, subjectId: request.params.id },
        'User removed'
      );
      return reply.status(204).send();
    }
  );
};
