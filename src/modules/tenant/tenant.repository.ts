import { eq } from 'drizzle-orm';
import { z } from 'zod';

import { tenants, type NewTenant, type TenantRow } from './tenant.schema.js';
import type { TenantContext } from './tenant.types.js';
import type { Database } from '../../shared/database/client.js';

const uuidSchema = z.string().uuid();

const UNIQUE_VIOLATION = '23505';

/** Slug or subdomain already taken, detected by the unique index */
export class DuplicateTenantError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Tenant with this slug or subdomain already exists', options);
    this.name = 'DuplicateTenantError';
  }
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

export interface TenantRepository {
  findById(id: string): Promise<TenantRow | null>;
  findBySlug(slug: string): Promise<TenantRow | null>;
  findBySubdomain(subdomain: string): Promise<TenantRow | null>;
  findAll(): Promise<TenantRow[]>;
  create(data: NewTenant): Promise<TenantRow>;
  update(id: string, data: Partial<Omit<NewTenant, 'id'>>): Promise<TenantRow | null>;
}

export function toTenantContext(row: TenantRow): TenantContext {
  const hasOverride = row.rateLimitPerMinute !== null || row.rateLimitBurst !== null;

  return {
    id: row.id,
    slug: row.slug,
    subdomain: row.subdomain,
    name: row.name,
    isActive: row.isActive,
    tier: row.tier,
    rateLimit: hasOverride
      ? {
          ...(row.rateLimitPerMinute !== null ? { requestsPerMinute: row.rateLimitPerMinute } : {}),
          ...(row.rateLimitBurst !== null ? { burst: row.rateLimitBurst } : {}),
        }
      : null,
  };
}

export function createTenantRepository(db: Database): TenantRepository {
  return {
    async findById(id: string): Promise<TenantRow | null> {
      // Ids are UUIDs; anything else cannot match and would fail the cast
      if (!uuidSchema.safeParse(id).success) {
        return null;
      }
      const result = await db.select().from(tenants).where(eq(tenants.id, id));
      return result[0] ?? null;
    },

    async findBySlug(slug: string): Promise<TenantRow | null> {
      const result = await db.select().from(tenants).where(eq(tenants.slug, slug));
      return result[0] ?? null;
    },

    async findBySubdomain(subdomain: string): Promise<TenantRow | null> {
      const result = await db
        .select()
        .from(tenants)
        .where(eq(tenants.subdomain, subdomain));
      return result[0] ?? null;
    },

    async findAll(): Promise<TenantRow[]> {
      return db.select().from(tenants);
    },

    async create(data: NewTenant): Promise<TenantRow> {
      let rows: TenantRow[];
      try {
        rows = await db.insert(tenants).values(data).returning();
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new DuplicateTenantError({ cause: err });
        }
        throw err;
      }

      const [row] = rows;
      if (!row) {
        throw new Error('Tenant insert returned no row');
      }
      return row;
    },

    async update(
      id: string,
      data: Partial<Omit<NewTenant, 'id'>>
    ): Promise<TenantRow | null> {
      if (!uuidSchema.safeParse(id).success) {
        return null;
      }
      const result = await db
        .update(tenants)
        .set(data)
        .where(eq(tenants.id, id))
        .returning();
      return result[0] ?? null;
    },
  };
}
