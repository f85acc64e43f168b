/**
 * Writes every list in the database as an export file, as CSV, or as
 * plain text with one file per list.
 *
 * Usage:
 *   tsx scripts/export-lists.ts [--out=<file>] [--csv] [--skip-archived]
 *   tsx scripts/export-lists.ts --text --out=<directory> [--skip-archived]
 */
import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { closeDb, getDb } from '@listsync/db';
import { DrizzleEntityStore, exportListsAsPlainText, exportToCsv, exportToJson } from '@listsync/core';

const args = process.argv.slice(2);
const outPath = args.find((a) => a.startsWith('--out='))?.split('=')[1];
const asText = args.includes('--text');
const asCsv = args.includes('--csv');
const includeArchived = !args.includes('--skip-archived');

async function writeTextFiles(store: DrizzleEntityStore, dir: string) {
  await mkdir(dir, { recursive: true });
  const files = await exportListsAsPlainText(store, { includeArchived });
  for (const file of files) {
    await writeFile(path.join(dir, file.fileName), file.content + '\n', 'utf8');
  }
  console.log(`Wrote ${files.length} list(s) to ${dir}`);
}

async function main() {
  if (asText && asCsv) {
    throw new Error('--text and --csv cannot be combined');
  }
  if (asText && !outPath) {
    throw new Error('--text writes one file per list and needs --out=<directory>');
  }

  const store = new DrizzleEntityStore(getDb());

  try {
    if (asText && outPath) {
      await writeTextFiles(store, outPath);
      return;
    }

    const output = asCsv
      ? await exportToCsv(store, { includeArchived })
      : (await exportToJson(store, { includeArchived, pretty: true })) + '\n';

    if (outPath) {
      await writeFile(outPath, output, 'utf8');
      console.log(`Wrote ${outPath}`);
    } else {
      process.stdout.write(output);
    }
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error('Export failed:', err);
  process.exit(1);
});
