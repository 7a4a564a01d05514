import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import {
  getMetrics,
  getMetricsContentType,
  httpRequestDurationSeconds,
  httpRequestsTotal,
} from '../shared/metrics/index.js';

declare module 'fastify' {
  interface FastifyRequest {
    startTime?: bigint;
  }
}

export interface MetricsPluginOptions {
  enabled: boolean;
}

// eslint-disable-next-line @typescript-eslint/require-await
const metricsPlugin: FastifyPluginAsync<MetricsPluginOptions> = async (fastify, options) => {
  if (!options.enabled) {
    fastify.log.info('Metrics collection is disabled');
    return;
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  fastify.addHook('onRequest', async (request) => {
    request.startTime = process.hrtime.bigint();
  });

  // eslint-disable-next-line @typescript-eslint/require-await
  fastify.addHook('onResponse', async (request, reply) => {
    const endTime = process.hrtime.bigint();
    const startTime = request.startTime ?? endTime;
    const durationSeconds = Number(endTime - startTime) / 1e9;

    // Only admitted requests carry a trusted tenant id
    const tenantId = request.admission?.tenant.id ?? 'none';
    const method = request.method;
    const route = request.routeOptions.url ?? 'unmatched';

    httpRequestsTotal.inc({
      tenant_id: tenantId,
      method,
      route,
      status_code: reply.statusCode.toString(),
    });
    httpRequestDurationSeconds.observe({ tenant_id: tenantId, method, route }, durationSeconds);
  });

  // Unauthenticated, for Prometheus scraping
  fastify.get('/metrics', async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.type(getMetricsContentType()).send(metrics);
  });

  fastify.log.info('Metrics plugin registered');
};

export default fp(metricsPlugin, {
  name: 'metrics',
  dependencies: ['admission'],
});
