import type { Logger } from 'pino';

import type { TenantEventPublisher } from './tenant.events.js';
import { toTenantContext, type TenantRepository } from './tenant.repository.js';
import type { TenantResolver } from './tenant.resolver.js';
import type { NewTenant } from './tenant.schema.js';
import type {
  CreateTenantInput,
  TenantContext,
  UpdateTenantInput,
} from './tenant.types.js';

export interface TenantServiceDeps {
  repository: TenantRepository;
  resolver: Pick<TenantResolver, 'invalidate'>;
  events: TenantEventPublisher;
  logger: Logger;
}

/**
 * Tenant provisioning used by the admin API. Admission itself only reads
 * tenants through the resolver.
 */
export interface TenantService {
  getTenantById(id: string): Promise<TenantContext | null>;
  getTenantBySlugOrSubdomain(slug: string, subdomain: string): Promise<TenantContext | null>;
  getAllTenants(): Promise<TenantContext[]>;
  createTenant(input: CreateTenantInput): Promise<TenantContext>;
  updateTenant(id: string, input: UpdateTenantInput): Promise<TenantContext | null>;
}

function toRowUpdate(input: UpdateTenantInput): Partial<Omit<NewTenant, 'id'>> {
  const update: Partial<Omit<NewTenant, 'id'>> = {};

  if (input.name !== undefined) update.name = input.name;
  if (input.isActive !== undefined) update.isActive = input.isActive;
  if (input.tier !== undefined) update.tier = input.tier;
  if (input.rateLimit !== undefined) {
    update.rateLimitPerMinute = input.rateLimit?.requestsPerMinute ?? null;
    update.rateLimitBurst = input.rateLimit?.burst ?? null;
  }

  return update;
}

export function createTenantService(deps: TenantServiceDeps): TenantService {
  const { repository, resolver, events, logger } = deps;

  return {
    async getTenantById(id: string): Promise<TenantContext | null> {
      const row = await repository.findById(id);
      return row ? toTenantContext(row) : null;
    },

    async getTenantBySlugOrSubdomain(
      slug: string,
      subdomain: string
    ): Promise<TenantContext | null> {
      const row = (await repository.findBySlug(slug)) ?? (await repository.findBySubdomain(subdomain));
      return row ? toTenantContext(row) : null;
    },

    async getAllTenants(): Promise<TenantContext[]> {
      const rows = await repository.findAll();
      return rows.map(toTenantContext);
    },

    async createTenant(input: CreateTenantInput): Promise<TenantContext> {
      const row = await repository.create({
        name: input.name,
        slug: input.slug,
        subdomain: input.subdomain,
        tier: input.tier ?? 'free',
        rateLimitPerMinute: input.rateLimit?.requestsPerMinute ?? null,
        rateLimitBurst: input.rateLimit?.burst ?? null,
      });

      logger.info({ tenantId: row.id, slug: row.slug }, 'Tenant created');
      return toTenantContext(row);
    },

    async updateTenant(id: string, input: UpdateTenantInput): Promise<TenantContext | null> {
      const row = await repository.update(id, toRowUpdate(input));
      if (!row) {
        return null;
      }

      const tenant = toTenantContext(row);

      // Local cache first, then every other instance
      await resolver.invalidate(tenant);
      await events.publish({
        type: input.isActive === false ? 'tenant.deactivated' : 'tenant.updated',
        tenant: { id: tenant.id, slug: tenant.slug, subdomain: tenant.subdomain },
      });

      logger.info({ tenantId: tenant.id, isActive: tenant.isActive }, 'Tenant updated');
      return tenant;
    },
  };
}
