import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import { createTenantEventPublisher } from '../modules/tenant/tenant.events.js';
import { createTenantRepository } from '../modules/tenant/tenant.repository.js';
import { createTenantResolver, type TenantResolver } from '../modules/tenant/tenant.resolver.js';
import { createTenantService, type TenantService } from '../modules/tenant/tenant.service.js';
import { config } from '../shared/config/index.js';
import { logger } from '../shared/logger/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    tenantResolver: TenantResolver;
    tenantService: TenantService;
  }
}

// eslint-disable-next-line @typescript-eslint/require-await
const tenantServicePlugin: FastifyPluginAsync = async (fastify) => {
  const repository = createTenantRepository(fastify.db);

  const resolver = createTenantResolver({
    repository,
    cache: fastify.store,
    logger: logger.child({ component: 'tenant-resolver' }),
    cacheTtlSeconds: config.TENANT_CACHE_TTL_SECONDS,
    timeoutMs: config.STORE_TIMEOUT_MS,
    reservedSubdomains: config.RESERVED_SUBDOMAINS,
  });

  const service = createTenantService({
    repository,
    resolver,
    events: createTenantEventPublisher(fastify.redis),
    logger: logger.child({ component: 'tenant-service' }),
  });

  fastify.decorate('tenantResolver', resolver);
  fastify.decorate('tenantService', service);
  fastify.log.info('Tenant service registered');
};

export default fp(tenantServicePlugin, {
  name: 'tenant-service',
  dependencies: ['database', 'redis'],
});
