import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import { createTokenCodec, type TokenCodec } from '../modules/auth/token.codec.js';
import {
  createIdentityRepository,
  type IdentityRepository,
} from '../modules/identity/identity.repository.js';
import { createRbacAuthorizer, type RbacAuthorizer } from '../modules/rbac/rbac.authorizer.js';
import { config } from '../shared/config/index.js';
import { logger } from '../shared/logger/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    identityRepository: IdentityRepository;
    tokenCodec: TokenCodec;
    rbacAuthorizer: RbacAuthorizer;
  }
}

// eslint-disable-next-line @typescript-eslint/require-await
const identityPlugin: FastifyPluginAsync = async (fastify) => {
  const identityRepository = createIdentityRepository(fastify.db);

  fastify.decorate('identityRepository', identityRepository);
  fastify.decorate(
    'tokenCodec',
    createTokenCodec({
      secret: config.TOKEN_SECRET,
      issuer: config.TOKEN_ISSUER,
      ttlSeconds: config.TOKEN_TTL_SECONDS,
    })
  );
  fastify.decorate(
    'rbacAuthorizer',
    createRbacAuthorizer({
      identityRepository,
      logger: logger.child({ component: 'rbac' }),
      timeoutMs: config.STORE_TIMEOUT_MS,
    })
  );
  fastify.log.info('Identity services registered');
};

export default fp(identityPlugin, {
  name: 'identity',
  dependencies: ['database'],
});
