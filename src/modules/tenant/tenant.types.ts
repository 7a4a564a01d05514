import { z } from 'zod';

export const SUBSCRIPTION_TIERS = ['free', 'basic', 'premium', 'enterprise'] as const;

export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

export const rateLimitOverrideSchema = z.object({
  requestsPerMinute: z.number().int().positive().optional(),
  burst: z.number().int().positive().optional(),
});

export type RateLimitOverride = z.infer<typeof rateLimitOverrideSchema>;

/**
 * Read-only view of a tenant as the admission layer sees it. Also the shape
 * cached in the shared store, hence the schema.
 */
export const tenantContextSchema = z.object({
  id: z.string().min(1),
  slug: z.string().min(1),
  subdomain: z.string().min(1),
  name: z.string(),
  isActive: z.boolean(),
  tier: z.enum(SUBSCRIPTION_TIERS),
  rateLimit: rateLimitOverrideSchema.nullable(),
});

export type TenantContext = z.infer<typeof tenantContextSchema>;

/** Tenant hints carried by a request, in resolution priority order */
export interface TenantHints {
  /** X-Tenant-Slug header */
  slug?: string;
  /** Host header, subdomain is parsed from it */
  host?: string;
  /** X-Tenant-Id header */
  tenantId?: string;
}

export type TenantLookupKind = 'slug' | 'subdomain' | 'id';

export interface CreateTenantInput {
  name: string;
  slug: string;
  subdomain: string;
  tier?: SubscriptionTier;
  rateLimit?: RateLimitOverride;
}

export interface UpdateTenantInput {
  name?: string;
  isActive?: boolean;
  tier?: SubscriptionTier;
  rateLimit?: RateLimitOverride | null;
}
