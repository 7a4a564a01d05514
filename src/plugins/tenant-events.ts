import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import { TENANT_EVENTS_CHANNEL, parseTenantEvent } from '../modules/tenant/tenant.events.js';
import { createSubscriber } from '../shared/redis/client.js';

/**
 * Drops cached tenant contexts when another instance deactivates or changes
 * a tenant.
 */
const tenantEventsPlugin: FastifyPluginAsync = async (fastify) => {
  const subscriber = createSubscriber();
  const resolver = fastify.tenantResolver;

  subscriber.on('message', (channel: string, message: string) => {
    if (channel !== TENANT_EVENTS_CHANNEL) {
      return;
    }

    const event = parseTenantEvent(message);
    if (!event) {
      fastify.log.warn({ channel }, 'Ignoring malformed tenant event');
      return;
    }

    fastify.log.debug({ type: event.type, tenantId: event.tenant.id }, 'Tenant event received');
    // invalidate logs its own failures
    void resolver.invalidate(event.tenant);
  });

  await subscriber.connect();
  await subscriber.subscribe(TENANT_EVENTS_CHANNEL);
  fastify.log.info({ channel: TENANT_EVENTS_CHANNEL }, 'Subscribed to tenant events');

  fastify.addHook('onClose', async () => {
    await subscriber.quit();
  });
};

export default fp(tenantEventsPlugin, {
  name: 'tenant-events',
  dependencies: ['redis', 'tenant-service'],
});
