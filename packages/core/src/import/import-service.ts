/**
 * Entry point for list imports.
 *
 * preview() and commit() share one pipeline: read → detect → decode or
 * parse → validate → reconcile. commit() then hands the change-set to the
 * commit coordinator; preview() stops there.
 */

import { ConflictError, generateUlid, isAppError } from '@listsync/shared';
import { getImportConfig } from '../config/import-config';
import type { ImportConfig } from '../config/import-config';
import { logger as defaultLogger } from '../observability/logger';
import type { Logger } from '../observability/logger';
import { commitChangeSet } from './commit-coordinator';
import type { EntityStore } from './entity-store';
import { detectInputFormat, readRawInput } from './format-detector';
import { ImportError } from './import-error';
import { resolveImportOptions } from './import-options';
import { reconcile } from './reconciliation-engine';
import { buildImportPreview } from './results';
import { decodeExportData } from './schema-codec';
import { buildTextImportGraph, parsePlainText } from './text-parser';
import { validateExportData } from './graph-validator';
import type {
  ChangeSet,
  ExportData,
  ImportOptions,
  ImportPreview,
  ImportProgress,
  ImportResult,
  InputFormat,
} from './types';

export type RawImportInput = string | Uint8Array;

export interface ImportServiceDeps {
  store: EntityStore;
  config?: ImportConfig;
  logger?: Logger;
  now?: () => Date;
}

interface PreparedImport {
  importId: string;
  format: InputFormat;
  options: ImportOptions;
  changeSet: ChangeSet;
  /** Last snapshot emitted by the traversal; commit re-emits it with new labels. */
  lastProgress: ImportProgress | null;
}

export class ImportService {
  private readonly store: EntityStore;
  private readonly config: ImportConfig;
  private readonly log: Logger;
  private readonly now: () => Date;
  private inFlight = false;

  constructor(deps: ImportServiceDeps) {
    this.store = deps.store;
    this.config = deps.config ?? getImportConfig();
    this.log = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /** True while a preview or commit is running against this store. */
  get isImporting(): boolean {
    return this.inFlight;
  }

  async preview(raw: RawImportInput, options: Partial<ImportOptions> = {}): Promise<ImportPreview> {
    return this.exclusive('preview', options, async (importId, resolved) => {
      const prepared = await this.prepare(importId, raw, resolved);
      const preview = buildImportPreview(prepared.changeSet, prepared.format);
      this.log.info('Import preview completed', {
        importId,
        strategy: resolved.mergeStrategy,
        format: prepared.format,
        dryRun: true,
        conflictCount: preview.conflicts.length,
        errorCount: preview.errors.length,
      });
      return preview;
    });
  }

  async commit(raw: RawImportInput, options: Partial<ImportOptions> = {}): Promise<ImportResult> {
    return this.exclusive('commit', options, async (importId, resolved) => {
      const prepared = await this.prepare(importId, raw, resolved);
      const report = (currentOperation: string) => {
        if (prepared.lastProgress) resolved.onProgress?.({ ...prepared.lastProgress, currentOperation });
      };
      report('Saving changes');
      const result = await commitChangeSet(this.store, prepared.changeSet, {
        importId,
        format: prepared.format,
        signal: resolved.signal,
      });
      report('Import complete');
      this.log.info('Import committed', {
        importId,
        strategy: resolved.mergeStrategy,
        format: prepared.format,
        dryRun: false,
        listsCreated: result.listsCreated,
        listsUpdated: result.listsUpdated,
        itemsCreated: result.itemsCreated,
        itemsUpdated: result.itemsUpdated,
        listsDeleted: result.listsDeleted,
        conflictCount: result.conflicts.length,
        errorCount: result.errors.length,
      });
      return result;
    });
  }

  // ── Pipeline ──

  private async prepare(importId: string, raw: RawImportInput, options: ImportOptions): Promise<PreparedImport> {
    const text = readRawInput(raw, this.config.maxInputBytes);
    const detection = detectInputFormat(text);
    this.log.debug('Import input detected', { importId, format: detection.format, hints: detection.hints });

    const graph = detection.format === 'structured' ? decodeExportData(text) : this.graphFromText(text);

    if (options.validateData) {
      const issues = validateExportData(graph);
      if (issues.length > 0) {
        throw ImportError.validationFailed(issues);
      }
    }

    const existing = await this.store.findAllLists();
    let lastProgress: ImportProgress | null = null;
    const changeSet = reconcile({
      existing,
      incoming: graph,
      strategy: options.mergeStrategy,
      onProgress: (progress) => {
        lastProgress = progress;
        options.onProgress?.(progress);
      },
      signal: options.signal,
    });

    return { importId, format: detection.format, options, changeSet, lastProgress };
  }

  private graphFromText(text: string): ExportData {
    return buildTextImportGraph(parsePlainText(text), { listName: this.config.textListName, now: this.now() });
  }

  /**
   * Run one operation at a time. A second caller would diff against a
   * snapshot the first is about to change.
   */
  private async exclusive<T>(
    operation: 'preview' | 'commit',
    options: Partial<ImportOptions>,
    fn: (importId: string, options: ImportOptions) => Promise<T>,
  ): Promise<T> {
    if (this.inFlight) {
      throw new ConflictError('Another import is already in progress');
    }
    this.inFlight = true;

    const importId = generateUlid();
    const startTime = Date.now();
    try {
      const resolved = resolveImportOptions(options, this.config);
      this.log.info(`Import ${operation} started`, { importId, strategy: resolved.mergeStrategy });
      return await fn(importId, resolved);
    } catch (error: unknown) {
      const durationMs = Date.now() - startTime;
      if (isAppError(error)) {
        this.log.warn(`Import ${operation} failed`, {
          importId,
          durationMs,
          error: { code: error.code, message: error.message },
        });
      } else {
        const msg = error instanceof Error ? error.message : String(error);
        const stack = error instanceof Error ? error.stack : undefined;
        this.log.error(`Import ${operation} failed`, { importId, durationMs, error: { message: msg, stack } });
      }
      throw error;
    } finally {
      this.inFlight = false;
    }
  }
}
