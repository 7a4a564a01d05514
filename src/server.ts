import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import Fastify, { type FastifyInstance } from 'fastify';

import { tokenRoutes } from './modules/auth/token.routes.js';
import { identityRoutes } from './modules/identity/identity.routes.js';
import { tenantRoutes } from './modules/tenant/tenant.routes.js';
import adminAuthPlugin from './plugins/admin-auth.js';
import admissionPipelinePlugin from './plugins/admission-pipeline.js';
import admissionPlugin from './plugins/admission.js';
import databasePlugin from './plugins/database.js';
import identityPlugin from './plugins/identity.js';
import metricsPlugin from './plugins/metrics.js';
import redisPlugin from './plugins/redis.js';
import tenantEventsPlugin from './plugins/tenant-events.js';
import tenantServicePlugin from './plugins/tenant-service.js';
import { config } from './shared/config/index.js';
import { buildLoggerOptions } from './shared/logger/index.js';

export interface RouteOptions {
  adminApiKey: string;
  metricsEnabled: boolean;
}

/**
 * Everything that sits on top of the admission services. Expects
 * `admissionPipeline`, `tenantService`, `identityRepository` and
 * `tokenCodec` to be decorated already.
 */
export async function registerRoutes(app: FastifyInstance, options: RouteOptions): Promise<void> {
  await app.register(adminAuthPlugin, { apiKey: options.adminApiKey });
  await app.register(admissionPlugin);
  await app.register(metricsPlugin, { enabled: options.metricsEnabled });

  app.get('/health', async (_request, reply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  await app.register(identityRoutes);

  await app.register(
    async (adminApp) => {
      adminApp.addHook('preHandler', adminApp.adminAuth);
      await adminApp.register(tenantRoutes);
      await adminApp.register(tokenRoutes);
    },
    { prefix: '/admin' }
  );
}

export async function createServer(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: buildLoggerOptions(),
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Order matters: later plugins read earlier decorations
  await app.register(databasePlugin);
  await app.register(redisPlugin);
  await app.register(tenantServicePlugin);
  await app.register(tenantEventsPlugin);
  await app.register(identityPlugin);
  await app.register(admissionPipelinePlugin);

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  app.get('/ready', async (request, reply) => {
    const [database, redis] = await Promise.allSettled([app.pingDatabase(), app.pingRedis()]);
    const checks = {
      database: database.status === 'fulfilled' ? 'up' : 'down',
      redis: redis.status === 'fulfilled' && redis.value ? 'up' : 'down',
    };
    const ready = checks.database === 'up' && checks.redis === 'up';

    if (!ready) {
      request.log.warn({ checks }, 'Readiness check failed');
    }

    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  await registerRoutes(app, {
    adminApiKey: config.ADMIN_API_KEY,
    metricsEnabled: config.METRICS_ENABLED,
  });

  return app;
}

export async function startServer(): Promise<FastifyInstance> {
  const app = await createServer();

  // Plugins release their connections in onClose hooks
  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      app.log.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({
      port: config.PORT,
      host: '0.0.0.0',
    });

    app.log.info({ port: config.PORT, env: config.NODE_ENV }, 'Tenant gate started');
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }

  return app;
}
