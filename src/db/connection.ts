import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { Pool } from 'pg';
import { config } from '@api/config';
import * as schema from './schema/index';

export function createPool(connectionString: string = config.database.url): Pool {
  return new pg.Pool({ connectionString });
}

export function createDb(pool: Pool) {
  return drizzle(pool, { schema });
}

export type AuditDb = ReturnType<typeof createDb>;
