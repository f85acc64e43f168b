/**
 * Types for the list import & reconciliation engine.
 */

import type { MERGE_STRATEGIES } from '../config/import-config';

// ── Entity Graph ─────────────────────────────────────────────────────

export interface ItemImage {
  id: string;
  itemId: string;
  /** Opaque image payload; base64 on the wire. */
  imageData: Uint8Array;
  orderNumber: number;
  createdAt: Date;
}

export interface Item {
  id: string;
  listId: string;
  title: string;
  /** `null` when absent; an empty string is a real (empty) description. */
  description: string | null;
  quantity: number;
  orderNumber: number;
  isCrossedOut: boolean;
  createdAt: Date;
  modifiedAt: Date;
  images: ItemImage[];
}

export interface List {
  id: string;
  name: string;
  orderNumber: number;
  isArchived: boolean;
  createdAt: Date;
  modifiedAt: Date;
  items: Item[];
}

/** Transport root of the structured format. */
export interface ExportData {
  version: string;
  exportDate: Date;
  lists: List[];
}

/** Scalar columns only: what the store writes for one row. */
export type ListRecord = Omit<List, 'items'>;
export type ItemRecord = Omit<Item, 'images'>;
export type ItemImageRecord = ItemImage;

// ── Detection / Parsing ──────────────────────────────────────────────

export type InputFormat = 'structured' | 'freeText';

export interface FormatDetection {
  format: InputFormat;
  hints: string[];
}

export interface ParsedTextItem {
  title: string;
  isCrossedOut: boolean;
  quantity: number;
}

// ── Validation ───────────────────────────────────────────────────────

export type ValidationIssueCode =
  | 'EMPTY_LIST_NAME'
  | 'EMPTY_ITEM_TITLE'
  | 'INVALID_QUANTITY'
  | 'MISSING_VERSION'
  | 'UNSUPPORTED_VERSION'
  | 'INVALID_EXPORT_DATE'
  | 'DUPLICATE_LIST_ID'
  | 'ORPHAN_ITEM';

export interface ValidationIssue {
  field: string;
  code: ValidationIssueCode;
  message: string;
}

// ── Reconciliation ───────────────────────────────────────────────────

export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export type ConflictType = 'listModified' | 'itemModified' | 'listDeleted' | 'itemDeleted';

export interface ConflictDetail {
  readonly type: ConflictType;
  readonly entityName: string;
  readonly entityId: string;
  readonly currentValue: string;
  /** Absent for deletions. */
  readonly incomingValue?: string;
  readonly message: string;
}

export interface ChangeSetDeletions {
  listIds: string[];
  itemIds: string[];
  imageIds: string[];
}

/**
 * The plan produced by one reconciliation pass. Preview reports it,
 * commit applies it; nothing touches the store until then.
 */
export interface ChangeSet {
  strategy: MergeStrategy;
  listsToCreate: ListRecord[];
  listsToUpdate: ListRecord[];
  itemsToCreate: ItemRecord[];
  itemsToUpdate: ItemRecord[];
  imagesToCreate: ItemImageRecord[];
  deletions: ChangeSetDeletions;
  conflicts: ConflictDetail[];
  errors: string[];
}

export type ReconciliationState = 'notStarted' | 'traversing' | 'completed' | 'aborted';

// ── Progress ─────────────────────────────────────────────────────────

export interface ImportProgress {
  totalLists: number;
  processedLists: number;
  totalItems: number;
  processedItems: number;
  currentOperation: string;
  overallProgress: number;
  progressPercentage: number;
}

export type ProgressListener = (progress: ImportProgress) => void;

// ── Options ──────────────────────────────────────────────────────────

export interface ImportOptions {
  mergeStrategy: MergeStrategy;
  validateData: boolean;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

// ── Results ──────────────────────────────────────────────────────────

export interface ImportPreview {
  strategy: MergeStrategy;
  format: InputFormat;
  listsToCreate: number;
  listsToUpdate: number;
  itemsToCreate: number;
  itemsToUpdate: number;
  conflicts: ConflictDetail[];
  errors: string[];
  totalChanges: number;
  hasConflicts: boolean;
  isValid: boolean;
}

export interface ImportResult {
  importId: string;
  strategy: MergeStrategy;
  format: InputFormat;
  listsCreated: number;
  listsUpdated: number;
  itemsCreated: number;
  itemsUpdated: number;
  /** Lists removed by a `replace` import. */
  listsDeleted: number;
  conflicts: ConflictDetail[];
  errors: string[];
  totalChanges: number;
  hasConflicts: boolean;
  wasSuccessful: boolean;
}
