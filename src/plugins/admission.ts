import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import type { AdmissionContext } from '../modules/admission/admission.types.js';
import type { Action, AuthorizationTarget } from '../modules/rbac/rbac.types.js';
import type { TenantHints } from '../modules/tenant/tenant.types.js';
import { RateLimitExceededError } from '../shared/errors/index.js';

export type AdmissionTargetResolver = (request: FastifyRequest) => AuthorizationTarget;

export type AdmissionHandler = (
  request: FastifyRequest,
  reply: FastifyReply
) => Promise<FastifyReply | undefined>;

declare module 'fastify' {
  interface FastifyInstance {
    /** preHandler that admits the request for `action` or rejects it */
    admission: (action: Action, target?: AdmissionTargetResolver) => AdmissionHandler;
  }

  interface FastifyRequest {
    admission: AdmissionContext | null;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function extractTenantHints(request: FastifyRequest): TenantHints {
  return {
    slug: headerValue(request.headers['x-tenant-slug']),
    host: headerValue(request.headers.host),
    tenantId: headerValue(request.headers['x-tenant-id']),
  };
}

// eslint-disable-next-line @typescript-eslint/require-await
const admissionPlugin: FastifyPluginAsync = async (fastify) => {
  const pipeline = fastify.admissionPipeline;

  fastify.decorateRequest('admission', null);

  fastify.decorate('admission', (action: Action, target?: AdmissionTargetResolver) => {
    return async function (
      request: FastifyRequest,
      reply: FastifyReply
    ): Promise<FastifyReply | undefined> {
      const result = await pipeline.admit({
        hints: extractTenantHints(request),
        authorization: request.headers.authorization,
        action,
        target: target?.(request),
      });

      if (result.ok) {
        reply.header('X-RateLimit-Limit', result.context.rateLimit.limit);
        reply.header('X-RateLimit-Remaining', result.context.rateLimit.remaining);
        request.admission = result.context;
        return;
      }

      if (result.rateLimit) {
        reply.header('X-RateLimit-Limit', result.rateLimit.limit);
        reply.header('X-RateLimit-Remaining', result.rateLimit.remaining);
      }

      const { error } = result;
      if (error instanceof RateLimitExceededError) {
        reply.header('Retry-After', Math.max(1, Math.ceil(error.retryAfterSeconds)));
      }

      request.log.debug({ stage: result.stage, code: error.code }, 'Admission rejected');
      return reply.status(error.statusCode).send(error.toJSON());
    };
  });
};

export default fp(admissionPlugin, {
  name: 'admission',
  decorators: { fastify: ['admissionPipeline'] },
});
