import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool, PoolConfig } from 'pg';
import * as schema from './schema.js';

export const IS_DEV = process.env.NODE_ENV !== 'production';
const defaultTimeout = IS_DEV ? 50000 : 5000;

export type Database = NodePgDatabase<typeof schema>;

export function buildPoolConfig(connectionString: string): PoolConfig {
  return {
    connectionString,
    max: 10,
    min: 0,
    connectionTimeoutMillis: IS_DEV ? 120000 : 5000,
    idleTimeoutMillis: defaultTimeout,
    statement_timeout: defaultTimeout,
    query_timeout: defaultTimeout,
  };
}

export function createPool(connectionString: string): Pool {
  const pool = new Pool(buildPoolConfig(connectionString));

  // Without a listener an idle client error would crash the process
  pool.on('error', (error) => {
    console.error({ error }, 'Unexpected error on idle client');
  });
  return pool;
}

export function createDatabase(pool: Pool): Database {
  return drizzle({ client: pool, schema });
}

export { schema };
