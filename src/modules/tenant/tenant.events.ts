import type { Redis } from 'ioredis';
import { z } from 'zod';

export const TENANT_EVENTS_CHANNEL = 'tenant-events';

const tenantRefSchema = z.object({
  id: z.string().min(1),
  slug: z.string().min(1),
  subdomain: z.string().min(1),
});

export const tenantEventSchema = z.object({
  type: z.enum(['tenant.deactivated', 'tenant.updated']),
  tenant: tenantRefSchema,
});

export type TenantEvent = z.infer<typeof tenantEventSchema>;

export interface TenantEventPublisher {
  publish(event: TenantEvent): Promise<void>;
}

export function createTenantEventPublisher(
  redis: Pick<Redis, 'publish'>
): TenantEventPublisher {
  return {
    async publish(event: TenantEvent): Promise<void> {
      await redis.publish(TENANT_EVENTS_CHANNEL, JSON.stringify(event));
    },
  };
}

export function parseTenantEvent(message: string): TenantEvent | null {
  let payload: unknown;
  try {
    payload = JSON.parse(message);
  } catch {
    return null;
  }

  const result = tenantEventSchema.safeParse(payload);
  return result.success ? result.data : null;
}
