import type { FastifyPluginAsync } from 'fastify';

import { issueTokenSchema } from './auth.types.js';

/**
 * Admin-only token minting. Stands in for an external identity provider.
 */
// eslint-disable-next-line @typescript-eslint/require-await
export const tokenRoutes: FastifyPluginAsync = async (app) => {
  const { identityRepository, tenantService, tokenCodec } = app;

  app.post('/tokens', async (request, reply) => {
    const parseResult = issueTokenSchema.safeParse(request.body);

    if (!parseResult.success) {
      return reply.status(400).send({
        error: 'Bad Request',
        message: 'Invalid request body',
        details: parseResult.error.flatten(),
      });
    }

    const { tenantId, subjectId } = parseResult.data;

    const tenant = await tenantService.getTenantById(tenantId);
    if (!tenant) {
      return reply.status(404).send({
        error: 'Not Found',
        message: 'Tenant not found',
      });
    }

    if (!tenant.isActive) {
      return reply.status(409).send({
        error: 'Conflict',
        message: 'Tenant is inactive',
      });
    }

    const identity = await identityRepository.findIdentity(tenantId, subjectId);
    if (!identity) {
      return reply.status(404).send({
        error: 'Not Found',
        message: 'User not found in tenant',
      });
    }

    return reply.status(201).send({ data: tokenCodec.issue(identity, tenant) });
  });
};
