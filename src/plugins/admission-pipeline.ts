import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import {
  createAdmissionPipeline,
  type AdmissionPipeline,
} from '../modules/admission/admission.pipeline.js';
import { config } from '../shared/config/index.js';
import { logger } from '../shared/logger/index.js';
import { createRateLimiter } from '../shared/rate-limiter/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    admissionPipeline: AdmissionPipeline;
  }
}

// eslint-disable-next-line @typescript-eslint/require-await
const admissionPipelinePlugin: FastifyPluginAsync = async (fastify) => {
  const rateLimiter = createRateLimiter({
    store: fastify.store,
    logger: logger.child({ component: 'rate-limiter' }),
    degradation: config.RATE_LIMIT_DEGRADATION,
    timeoutMs: config.STORE_TIMEOUT_MS,
    stateTtlSeconds: config.RATE_LIMIT_STATE_TTL_SECONDS,
    degradedRetryAfterSeconds: config.DEGRADED_RETRY_AFTER_SECONDS,
  });

  fastify.decorate(
    'admissionPipeline',
    createAdmissionPipeline({
      resolver: fastify.tenantResolver,
      rateLimiter,
      tokenCodec: fastify.tokenCodec,
      authorizer: fastify.rbacAuthorizer,
      logger: logger.child({ component: 'admission' }),
    })
  );
  fastify.log.info(
    { degradation: config.RATE_LIMIT_DEGRADATION },
    'Admission pipeline registered'
  );
};

export default fp(admissionPipelinePlugin, {
  name: 'admission-pipeline',
  dependencies: ['redis', 'tenant-service', 'identity'],
});
