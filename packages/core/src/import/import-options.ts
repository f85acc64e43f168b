import { z } from 'zod';
import { assertValidated } from '@listsync/shared';
import { MERGE_STRATEGIES } from '../config/import-config';
import type { ImportConfig } from '../config/import-config';
import type { ImportOptions, MergeStrategy } from './types';

export const importOptionsSchema = z.object({
  mergeStrategy: z.enum(MERGE_STRATEGIES),
  validateData: z.boolean(),
});

export const DEFAULT_IMPORT_OPTIONS: ImportOptions = { mergeStrategy: 'merge', validateData: true };
export const REPLACE_IMPORT_OPTIONS: ImportOptions = { mergeStrategy: 'replace', validateData: true };
export const APPEND_IMPORT_OPTIONS: ImportOptions = { mergeStrategy: 'append', validateData: true };

/**
 * Fill unset options from configuration and check the rest, so callers
 * outside the type system cannot slip in an unknown strategy.
 */
export function resolveImportOptions(
  input: Partial<ImportOptions>,
  config: Pick<ImportConfig, 'defaultStrategy' | 'defaultValidateData'>,
): ImportOptions {
  const parsed = importOptionsSchema.safeParse({
    mergeStrategy: input.mergeStrategy ?? config.defaultStrategy,
    validateData: input.validateData ?? config.defaultValidateData,
  });
  assertValidated(parsed, 'Invalid import options');
  return {
    ...parsed.data,
    onProgress: input.onProgress,
    signal: input.signal,
  };
}

// ── Labels ───────────────────────────────────────────────────────────

export const MERGE_STRATEGY_LABELS: Record<MergeStrategy, string> = {
  merge: 'Merge',
  replace: 'Replace All',
  append: 'Append as New',
};

export const MERGE_STRATEGY_DESCRIPTIONS: Record<MergeStrategy, string> = {
  merge: 'Update existing items and add new ones',
  replace: 'Delete all data and import fresh',
  append: 'Create duplicates with new IDs',
};
