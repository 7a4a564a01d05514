import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';

import { DuplicateTenantError } from './tenant.repository.js';
import { SUBSCRIPTION_TIERS, rateLimitOverrideSchema } from './tenant.types.js';

const urlLabel = z
  .string()
  .min(1)
  .max(63)
  .regex(/^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/, 'must be lowercase letters, digits and hyphens');

const createTenantSchema = z.object({
  name: z.string().min(1).max(255),
  slug: urlLabel,
  subdomain: urlLabel,
  tier: z.enum(SUBSCRIPTION_TIERS).optional(),
  rateLimit: rateLimitOverrideSchema.optional(),
});

const updateTenantSchema = z.object({
  name: z.string().min(1).max(255).optional(),
  isActive: z.boolean().optional(),
  tier: z.enum(SUBSCRIPTION_TIERS).optional(),
  rateLimit: rateLimitOverrideSchema.nullable().optional(),
});

interface TenantParams {
  id: string;
}

function sendDuplicate(reply: FastifyReply): FastifyReply {
  return reply.status(409).send({
    error: 'Conflict',
    message: 'Tenant with this slug or subdomain already exists',
  });
}

// eslint-disable-next-line @typescript-eslint/require-await
export const tenantRoutes: FastifyPluginAsync = async (app) => {
  const { tenantService } = app;

  app.get('/tenants', async (_request, reply) => {
    const tenants = await tenantService.getAllTenants();
    return reply.send({ data: tenants });
  });

  app.get<{ Params: TenantParams }>('/tenants/:id', async (request, reply) => {
    const tenant = await tenantService.getTenantById(request.params.id);

    if (!tenant) {
      return reply.status(404).send({
        error: 'Not Found',
        message: 'Tenant not found',
      });
    }

    return reply.send({ data: tenant });
  });

  app.post('/tenants', async (request, reply) => {
    const parseResult = createTenantSchema.safeParse(request.body);

    if (!parseResult.success) {
      return reply.status(400).send({
        error: 'Bad Request',
        message: 'Invalid request body',
        details: parseResult.error.flatten(),
      });
    }

    const { slug, subdomain } = parseResult.data;
    const existing = await tenantService.getTenantBySlugOrSubdomain(slug, subdomain);
    if (existing) {
      return sendDuplicate(reply);
    }

    try {
      const tenant = await tenantService.createTenant(parseResult.data);
      return reply.status(201).send({ data: tenant });
    } catch (err) {
      // A concurrent create took the slug or subdomain after the check
      if (err instanceof DuplicateTenantError) {
        return sendDuplicate(reply);
      }
      throw err;
    }
  });

  // Deactivation goes through here and invalidates cached tenant contexts
  app.patch<{ Params: TenantParams }>('/tenants/:id', async (request, reply) => {
    const parseResult = updateTenantSchema.safeParse(request.body);

    if (!parseResult.success) {
      return reply.status(400).send({
        error: 'Bad Request',
        message: 'Invalid request body',
        details: parseResult.error.flatten(),
      });
    }

    const tenant = await tenantService.updateTenant(request.params.id, parseResult.data);

    if (!tenant) {
      return reply.status(404).send({
        error: 'Not Found',
        message: 'Tenant not found',
      });
    }

    return reply.send({ data: tenant });
  });
};
