export * from './import';
export * from './export';
export { getImportConfig, resetImportConfig, MERGE_STRATEGIES } from './config/import-config';
export type { ImportConfig } from './config/import-config';
export { logger, log, setLogLevel } from './observability/logger';
export type { Logger, LogLevel, LogEntry } from './observability/logger';
