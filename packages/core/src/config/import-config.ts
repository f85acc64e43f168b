/**
 * Import configuration — read once from the environment and cached.
 *
 * Every setting has a default so the engine runs with an empty environment.
 */

import { z } from 'zod';
import { assertValidated } from '@listsync/shared';

export const MERGE_STRATEGIES = ['replace', 'merge', 'append'] as const;

const DEFAULT_MAX_INPUT_BYTES = 10 * 1024 * 1024; // 10MB

const importEnvSchema = z.object({
  IMPORT_MAX_INPUT_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_INPUT_BYTES),
  IMPORT_TEXT_LIST_NAME: z.string().trim().min(1).max(200).default('Imported List'),
  IMPORT_DEFAULT_STRATEGY: z.enum(MERGE_STRATEGIES).default('merge'),
  IMPORT_VALIDATE_DATA: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
});

export interface ImportConfig {
  /** Raw payloads larger than this are rejected as invalid data. */
  maxInputBytes: number;
  /** Name of the list that free-text imports are collected into. */
  textListName: string;
  defaultStrategy: (typeof MERGE_STRATEGIES)[number];
  defaultValidateData: boolean;
}

let _config: ImportConfig | null = null;

export function getImportConfig(env: NodeJS.ProcessEnv = process.env): ImportConfig {
  if (_config) return _config;

  const parsed = importEnvSchema.safeParse({
    IMPORT_MAX_INPUT_BYTES: env.IMPORT_MAX_INPUT_BYTES || undefined,
    IMPORT_TEXT_LIST_NAME: env.IMPORT_TEXT_LIST_NAME || undefined,
    IMPORT_DEFAULT_STRATEGY: env.IMPORT_DEFAULT_STRATEGY || undefined,
    IMPORT_VALIDATE_DATA: env.IMPORT_VALIDATE_DATA || undefined,
  });
  assertValidated(parsed, 'Invalid import configuration');

  _config = {
    maxInputBytes: parsed.data.IMPORT_MAX_INPUT_BYTES,
    textListName: parsed.data.IMPORT_TEXT_LIST_NAME,
    defaultStrategy: parsed.data.IMPORT_DEFAULT_STRATEGY,
    defaultValidateData: parsed.data.IMPORT_VALIDATE_DATA,
  };
  return _config;
}

/** Reset cached config (for testing) */
export function resetImportConfig(): void {
  _config = null;
}
