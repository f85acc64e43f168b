export type * from './types';
export { ImportError, isImportError } from './import-error';
export type { ImportErrorKind } from './import-error';
export { readRawInput, detectInputFormat } from './format-detector';
export { parseTextLine, parsePlainText, buildTextImportGraph } from './text-parser';
export type { TextImportGraphOptions } from './text-parser';
export {
  CURRENT_EXPORT_VERSION,
  SUPPORTED_EXPORT_VERSIONS,
  exportDataSchema,
  decodeExportData,
  encodeExportData,
} from './schema-codec';
export type { EncodeOptions } from './schema-codec';
export { validateExportData } from './graph-validator';
export { ReconciliationRun, reconcile } from './reconciliation-engine';
export type { ReconcileInput } from './reconciliation-engine';
export {
  ImportProgressTracker,
  computeOverallProgress,
  toProgressPercentage,
  buildProgress,
} from './progress';
export type { ProgressCounts } from './progress';
export type { EntityStore, EntityStoreWriter } from './entity-store';
export { InMemoryEntityStore } from './in-memory-entity-store';
export { DrizzleEntityStore, assembleLists } from './drizzle-entity-store';
export { commitChangeSet } from './commit-coordinator';
export type { CommitContext } from './commit-coordinator';
export { buildImportPreview, buildImportResult } from './results';
export {
  importOptionsSchema,
  resolveImportOptions,
  DEFAULT_IMPORT_OPTIONS,
  REPLACE_IMPORT_OPTIONS,
  APPEND_IMPORT_OPTIONS,
  MERGE_STRATEGY_LABELS,
  MERGE_STRATEGY_DESCRIPTIONS,
} from './import-options';
export { formatImportSummary, formatPreviewSummary } from './summary';
export { ImportService } from './import-service';
export type { ImportServiceDeps, RawImportInput } from './import-service';
