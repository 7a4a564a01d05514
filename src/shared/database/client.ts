import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

import { config } from '../config/index.js';
import * as schema from './schema.js';

const queryClient = postgres(config.DATABASE_URL, {
  max: 10,
  idle_timeout: 20,
  connect_timeout: 10,
  onnotice: () => {},
});

export const db = drizzle(queryClient, { schema });

export type Database = PostgresJsDatabase<typeof schema>;

export async function pingDatabase(): Promise<boolean> {
  await queryClient`select 1`;
  return true;
}

export async function closeDatabase(): Promise<void> {
  await queryClient.end();
}

export { schema };
