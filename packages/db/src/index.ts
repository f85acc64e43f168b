export { createDbClient, getDb, closeDb, schema } from './client';
export type { Database, DbExecutor, DbConnectionOptions, DbHandle } from './client';
export * from './schema';
