/**
 * Imports a list export (JSON) or pasted notes (plain text) into the database.
 * Previews by default; nothing is written without --commit.
 *
 * Usage: tsx scripts/import-lists.ts <file> [--strategy=merge|replace|append] [--commit] [--no-validate] [--verbose]
 */
import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

import { readFile } from 'node:fs/promises';
import { closeDb, getDb } from '@listsync/db';
import {
  DrizzleEntityStore,
  ImportService,
  MERGE_STRATEGIES,
  MERGE_STRATEGY_DESCRIPTIONS,
  MERGE_STRATEGY_LABELS,
  formatImportSummary,
  formatPreviewSummary,
  isImportError,
  setLogLevel,
} from '@listsync/core';
import type { ConflictDetail, MergeStrategy } from '@listsync/core';

const args = process.argv.slice(2);
const filePath = args.find((a) => !a.startsWith('--'));
const strategyArg = args.find((a) => a.startsWith('--strategy='))?.split('=')[1];
const shouldCommit = args.includes('--commit');
const validateData = !args.includes('--no-validate');
const verbose = args.includes('--verbose');

function isMergeStrategy(value: string): value is MergeStrategy {
  return MERGE_STRATEGIES.some((s) => s === value);
}

function printUsage(): void {
  console.error(
    'Usage: tsx scripts/import-lists.ts <file> [--strategy=merge|replace|append] [--commit] [--no-validate] [--verbose]',
  );
  console.error('\nStrategies:');
  for (const strategy of MERGE_STRATEGIES) {
    console.error(`  ${strategy.padEnd(8)} ${MERGE_STRATEGY_LABELS[strategy]}: ${MERGE_STRATEGY_DESCRIPTIONS[strategy]}`);
  }
}

function printConflicts(conflicts: ConflictDetail[]): void {
  if (conflicts.length === 0) return;
  console.log(`\nConflicts (${conflicts.length}):`);
  for (const conflict of conflicts) {
    console.log(`  - ${conflict.message}`);
  }
}

function printErrors(errors: string[]): void {
  if (errors.length === 0) return;
  console.log(`\nSkipped (${errors.length}):`);
  for (const error of errors) {
    console.log(`  - ${error}`);
  }
}

async function main(): Promise<number> {
  if (!filePath) {
    printUsage();
    return 1;
  }
  let mergeStrategy: MergeStrategy | undefined;
  if (strategyArg !== undefined) {
    if (!isMergeStrategy(strategyArg)) {
      console.error(`Unknown strategy: ${strategyArg}`);
      printUsage();
      return 1;
    }
    mergeStrategy = strategyArg;
  }

  // JSON log lines would interleave with the summary below.
  setLogLevel(verbose ? 'debug' : 'warn');

  const raw = await readFile(filePath);
  const service = new ImportService({ store: new DrizzleEntityStore(getDb()) });
  const options = { mergeStrategy, validateData };

  try {
    if (shouldCommit) {
      const result = await service.commit(raw, options);
      console.log(`${MERGE_STRATEGY_LABELS[result.strategy]}: ${formatImportSummary(result)}`);
      if (result.listsDeleted > 0) console.log(`Removed ${result.listsDeleted} existing list(s)`);
      printConflicts(result.conflicts);
      printErrors(result.errors);
    } else {
      const preview = await service.preview(raw, options);
      console.log(`${MERGE_STRATEGY_LABELS[preview.strategy]} (preview): ${formatPreviewSummary(preview)}`);
      console.log(MERGE_STRATEGY_DESCRIPTIONS[preview.strategy]);
      printConflicts(preview.conflicts);
      printErrors(preview.errors);
      console.log('\nRe-run with --commit to apply.');
    }
    return 0;
  } catch (err: unknown) {
    if (isImportError(err)) {
      console.error(err.message);
      for (const detail of err.details ?? []) {
        console.error(`  ${detail.field}: ${detail.message}`);
      }
      return 1;
    }
    throw err;
  } finally {
    await closeDb();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('Import failed:', err);
    process.exit(1);
  });
