import {
  boolean,
  integer,
  pgEnum,
  pgTable,
  timestamp,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

import { SUBSCRIPTION_TIERS } from './tenant.types.js';

export const subscriptionTierEnum = pgEnum('subscription_tier', SUBSCRIPTION_TIERS);

export const tenants = pgTable('tenants', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 255 }).notNull(),
  slug: varchar('slug', { length: 100 }).notNull().unique(),
  subdomain: varchar('subdomain', { length: 63 }).notNull().unique(),
  isActive: boolean('is_active').notNull().default(true),
  tier: subscriptionTierEnum('subscription_tier').notNull().default('free'),
  // NULL falls back to the tier default
  rateLimitPerMinute: integer('rate_limit_per_minute'),
  rateLimitBurst: integer('rate_limit_burst'),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true })
    .notNull()
    .defaultNow()
    .$onUpdate(() => new Date()),
});

export type TenantRow = typeof tenants.$inferSelect;
export type NewTenant = typeof tenants.$inferInsert;
