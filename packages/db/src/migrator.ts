import path from 'node:path';
import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';

/** Folder drizzle-kit generates into (see `drizzle.config.ts`). */
export const MIGRATIONS_FOLDER = path.resolve(__dirname, '../migrations');

export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/:[^:@]+@/, ':***@');
}

/**
 * Applies every pending drizzle-kit migration over a single admin
 * connection, then closes it whether or not the run succeeded.
 */
export async function applyMigrations(
  connectionString: string,
  migrationsFolder: string = MIGRATIONS_FOLDER,
): Promise<void> {
  const client = postgres(connectionString, { max: 1, prepare: false });
  try {
    await migrate(drizzle(client), { migrationsFolder });
  } finally {
    await client.end();
  }
}
