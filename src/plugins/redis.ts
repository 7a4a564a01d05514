import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { Redis } from 'ioredis';

import { redis, connectRedis, closeRedis, pingRedis } from '../shared/redis/client.js';
import { createRedisStore, type SharedStore } from '../shared/store/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
    /** Tenant cache and rate-limit state */
    store: SharedStore;
    pingRedis: () => Promise<boolean>;
  }
}

const redisPlugin: FastifyPluginAsync = async (fastify) => {
  await connectRedis();
  fastify.log.info('Redis connection established');

  fastify.decorate('redis', redis);
  fastify.decorate('store', createRedisStore(redis));
  fastify.decorate('pingRedis', pingRedis);

  fastify.addHook('onClose', async () => {
    fastify.log.info('Closing Redis connection...');
    await closeRedis();
    fastify.log.info('Redis connection closed');
  });
};

export default fp(redisPlugin, {
  name: 'redis',
});
