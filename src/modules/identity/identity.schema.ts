import {
  boolean,
  index,
  pgEnum,
  pgTable,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

import { ROLES } from './identity.types.js';
import { tenants } from '../tenant/tenant.schema.js';

export const userRoleEnum = pgEnum('user_role', ROLES);

export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    email: varchar('email', { length: 255 }).notNull(),
    role: userRoleEnum('role').notNull().default('member'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow()
      .$onUpdate(() => new Date()),
  },
  (table) => ({
    // Same email may exist in several tenants
    tenantEmailIdx: uniqueIndex('idx_user_tenant_email').on(table.tenantId, table.email),
    tenantRoleIdx: index('idx_user_tenant_role').on(table.tenantId, table.role),
  })
);

export type UserRow = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
