import path from 'node:path';
import dotenv from 'dotenv';

const ROOT_DIR = path.resolve(__dirname, '../../..');
dotenv.config({ path: path.join(ROOT_DIR, '.env.local') });
dotenv.config({ path: path.join(ROOT_DIR, '.env') });

import { applyMigrations, maskConnectionString, MIGRATIONS_FOLDER } from './migrator';

async function runMigrations() {
  const connectionString = process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL_ADMIN or DATABASE_URL environment variable is required');
  }

  console.log(`Connecting to database: ${maskConnectionString(connectionString)}`);
  console.log('Running migrations...');
  await applyMigrations(connectionString, MIGRATIONS_FOLDER);
  console.log('Migrations complete.');
}

runMigrations().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
