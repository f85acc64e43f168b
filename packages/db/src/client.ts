import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase, PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = PostgresJsDatabase<typeof schema>;

/**
 * Anything that can run list/item queries: the root client or an open
 * transaction handed to a `db.transaction()` callback.
 */
export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export interface DbConnectionOptions {
  connectionString: string;
  poolMax?: number;
}

export interface DbHandle {
  db: DrizzleDB;
  close: () => Promise<void>;
}

export function createDbClient(options: DbConnectionOptions): DbHandle {
  const client = postgres(options.connectionString, {
    max: options.poolMax ?? 2,
    prepare: process.env.DB_PREPARE_STATEMENTS === 'true',
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: 10,
    onnotice: (notice) => {
      console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
    },
  });
  return {
    db: drizzle(client, { schema }),
    close: () => client.end(),
  };
}

let _handle: DbHandle | null = null;

/**
 * Process-wide client built from DATABASE_URL on first use. Library code
 * takes a `Database` argument instead of calling this.
 */
export function getDb(): DrizzleDB {
  if (!_handle) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    _handle = createDbClient({
      connectionString,
      poolMax: parseInt(process.env.DB_POOL_MAX || '2', 10),
    });
  }
  return _handle.db;
}

export async function closeDb(): Promise<void> {
  if (!_handle) return;
  const handle = _handle;
  _handle = null;
  await handle.close();
}

export type Database = DrizzleDB;

export { schema };
