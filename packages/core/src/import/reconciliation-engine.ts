/**
 * Reconciliation engine.
 *
 * Diffs an incoming entity graph against a snapshot of the store and
 * produces a change-set. The same traversal backs both preview and commit;
 * the only difference is whether the change-set is applied afterwards.
 *
 * Strategies:
 *   replace — drop everything, recreate from the payload with its ids
 *   merge   — match lists by id then name, items by id; update or create
 *   append  — create everything with fresh ids
 */

import { generateUuid } from '@listsync/shared';
import { ImportError } from './import-error';
import { ImportProgressTracker } from './progress';
import type {
  ChangeSet,
  ConflictDetail,
  ExportData,
  Item,
  ItemImage,
  ItemRecord,
  List,
  ListRecord,
  MergeStrategy,
  ProgressListener,
  ReconciliationState,
} from './types';

export interface ReconcileInput {
  existing: List[];
  incoming: ExportData;
  strategy: MergeStrategy;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
  /** Id source for appended and re-keyed entities. */
  generateId?: () => string;
}

// ── Field Comparison ─────────────────────────────────────────────────

const LIST_MUTABLE_FIELDS = ['name', 'orderNumber', 'isArchived'] as const;
const ITEM_MUTABLE_FIELDS = ['title', 'description', 'quantity', 'orderNumber', 'isCrossedOut'] as const;

type ListField = (typeof LIST_MUTABLE_FIELDS)[number];
type ItemField = (typeof ITEM_MUTABLE_FIELDS)[number];

function formatValue(value: string | number | boolean | null): string {
  return value === null ? '(none)' : String(value);
}

function formatFields<T extends Record<F, string | number | boolean | null>, F extends string>(
  entity: T,
  fields: readonly F[],
): string {
  if (fields.length === 1) {
    const [only] = fields;
    if (only !== undefined) return formatValue(entity[only]);
  }
  return fields.map((f) => `${f}: ${formatValue(entity[f])}`).join(', ');
}

function changedListFields(current: ListRecord, incoming: ListRecord): ListField[] {
  return LIST_MUTABLE_FIELDS.filter((f) => current[f] !== incoming[f]);
}

function changedItemFields(current: ItemRecord, incoming: ItemRecord): ItemField[] {
  return ITEM_MUTABLE_FIELDS.filter((f) => current[f] !== incoming[f]);
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function toListRecord(list: List, id: string): ListRecord {
  return {
    id,
    name: list.name,
    orderNumber: list.orderNumber,
    isArchived: list.isArchived,
    createdAt: list.createdAt,
    modifiedAt: list.modifiedAt,
  };
}

function toItemRecord(item: Item, id: string, listId: string): ItemRecord {
  return {
    id,
    listId,
    title: item.title,
    description: item.description,
    quantity: item.quantity,
    orderNumber: item.orderNumber,
    isCrossedOut: item.isCrossedOut,
    createdAt: item.createdAt,
    modifiedAt: item.modifiedAt,
  };
}

// ── Per-entity Checks ────────────────────────────────────────────────
// Only reachable when pre-flight validation was skipped.

function listProblem(list: List): string | null {
  if (!list.name.trim()) return 'name cannot be empty';
  return null;
}

function itemProblem(item: Item): string | null {
  if (!item.title.trim()) return 'title cannot be empty';
  if (!Number.isInteger(item.quantity) || item.quantity < 1) {
    return `quantity must be at least 1 (got ${item.quantity})`;
  }
  return null;
}

// ── Run ──────────────────────────────────────────────────────────────

export class ReconciliationRun {
  private _state: ReconciliationState = 'notStarted';
  private readonly changeSet: ChangeSet;
  private readonly tracker: ImportProgressTracker;
  private readonly generateId: () => string;

  // Ids that already exist (or are planned) per table; a create may not reuse them.
  private readonly claimedListIds = new Set<string>();
  private readonly claimedItemIds = new Set<string>();
  private readonly claimedImageIds = new Set<string>();
  private readonly updatedItemIds = new Set<string>();

  private readonly existingById = new Map<string, List>();

  constructor(private readonly input: ReconcileInput) {
    this.generateId = input.generateId ?? generateUuid;
    this.changeSet = {
      strategy: input.strategy,
      listsToCreate: [],
      listsToUpdate: [],
      itemsToCreate: [],
      itemsToUpdate: [],
      imagesToCreate: [],
      deletions: { listIds: [], itemIds: [], imageIds: [] },
      conflicts: [],
      errors: [],
    };

    const totalItems = input.incoming.lists.reduce((sum, l) => sum + l.items.length, 0);
    this.tracker = new ImportProgressTracker(input.incoming.lists.length, totalItems, input.onProgress);

    for (const list of input.existing) {
      this.existingById.set(list.id, list);
    }
  }

  get state(): ReconciliationState {
    return this._state;
  }

  run(): ChangeSet {
    if (this._state !== 'notStarted') {
      throw new Error(`Reconciliation already ${this._state}`);
    }
    this._state = 'traversing';

    try {
      this.throwIfCancelled();
      this.tracker.report('Starting import');

      if (this.input.strategy === 'replace') {
        this.planReplaceDeletions();
      } else if (this.input.strategy === 'merge') {
        this.claimExistingIds();
      }

      this.input.incoming.lists.forEach((list, index) => {
        this.throwIfCancelled();
        this.processList(list, index);
        this.tracker.listProcessed();
      });
    } catch (err: unknown) {
      this._state = 'aborted';
      throw err;
    }

    this._state = 'completed';
    this.tracker.report('Reconciliation complete');
    return this.changeSet;
  }

  private throwIfCancelled(): void {
    if (this.input.signal?.aborted) {
      throw ImportError.cancelled();
    }
  }

  // ── Setup ──

  private planReplaceDeletions(): void {
    const { deletions } = this.changeSet;
    for (const list of this.input.existing) {
      deletions.listIds.push(list.id);
      for (const item of list.items) {
        deletions.itemIds.push(item.id);
        for (const image of item.images) {
          deletions.imageIds.push(image.id);
        }
      }
    }
  }

  private claimExistingIds(): void {
    for (const list of this.input.existing) {
      this.claimedListIds.add(list.id);
      for (const item of list.items) {
        this.claimedItemIds.add(item.id);
        for (const image of item.images) {
          this.claimedImageIds.add(image.id);
        }
      }
    }
  }

  /** Keep the incoming id unless it is taken; append never keeps it. */
  private claimId(claimed: Set<string>, incomingId: string): string {
    let id = incomingId;
    if (this.input.strategy === 'append' || claimed.has(id)) {
      do {
        id = this.generateId();
      } while (claimed.has(id));
    }
    claimed.add(id);
    return id;
  }

  // ── Lists ──

  private processList(list: List, index: number): void {
    const problem = listProblem(list);
    if (problem) {
      this.changeSet.errors.push(`Skipped list #${index + 1}: ${problem}`);
      this.tracker.itemsSkipped(list.items.length);
      return;
    }

    const match = this.input.strategy === 'merge' ? this.findMatchingList(list) : undefined;
    if (match) {
      this.planListUpdate(match, list);
    } else {
      this.planListCreate(list);
    }
  }

  /** First exact id match, else first case-insensitive trimmed name match in snapshot order. */
  private findMatchingList(list: List): List | undefined {
    const byId = this.existingById.get(list.id);
    if (byId) return byId;
    const wanted = normalizeName(list.name);
    return this.input.existing.find((candidate) => normalizeName(candidate.name) === wanted);
  }

  private planListCreate(list: List): void {
    const listId = this.claimId(this.claimedListIds, list.id);
    this.changeSet.listsToCreate.push(toListRecord(list, listId));

    list.items.forEach((item, index) => {
      if (this.acceptItem(item, index, list)) {
        this.planItemCreate(item, listId);
      }
      this.tracker.itemProcessed();
    });
  }

  private planListUpdate(current: List, incoming: List): void {
    const updated: ListRecord = {
      ...toListRecord(incoming, current.id),
      createdAt: current.createdAt,
    };
    this.changeSet.listsToUpdate.push(updated);

    const changed = changedListFields(current, updated);
    if (changed.length > 0) {
      this.changeSet.conflicts.push(buildListConflict(current, updated, changed));
    }

    const currentItems = new Map<string, Item>();
    for (const item of current.items) {
      currentItems.set(item.id, item);
    }

    incoming.items.forEach((item, index) => {
      if (this.acceptItem(item, index, incoming)) {
        const existingItem = currentItems.get(item.id);
        if (existingItem && !this.updatedItemIds.has(existingItem.id)) {
          this.planItemUpdate(existingItem, item);
        } else {
          this.planItemCreate(item, current.id);
        }
      }
      this.tracker.itemProcessed();
    });
  }

  // ── Items ──

  private acceptItem(item: Item, index: number, list: List): boolean {
    const problem = itemProblem(item);
    if (!problem) return true;
    const label = item.title.trim() ? `'${item.title}'` : `#${index + 1}`;
    this.changeSet.errors.push(`Skipped item ${label} in list '${list.name}': ${problem}`);
    return false;
  }

  private planItemCreate(item: Item, listId: string): void {
    const itemId = this.claimId(this.claimedItemIds, item.id);
    this.changeSet.itemsToCreate.push(toItemRecord(item, itemId, listId));
    for (const image of item.images) {
      this.planImageCreate(image, itemId);
    }
  }

  private planItemUpdate(current: Item, incoming: Item): void {
    this.updatedItemIds.add(current.id);
    const updated: ItemRecord = {
      ...toItemRecord(incoming, current.id, current.listId),
      createdAt: current.createdAt,
    };
    this.changeSet.itemsToUpdate.push(updated);

    const changed = changedItemFields(current, updated);
    if (changed.length > 0) {
      this.changeSet.conflicts.push(buildItemConflict(current, updated, changed));
    }

    // Images are additive: new ones are attached, existing ones stay.
    const currentImageIds = new Set(current.images.map((img) => img.id));
    for (const image of incoming.images) {
      if (!currentImageIds.has(image.id)) {
        this.planImageCreate(image, current.id);
      }
    }
  }

  private planImageCreate(image: ItemImage, itemId: string): void {
    this.changeSet.imagesToCreate.push({
      id: this.claimId(this.claimedImageIds, image.id),
      itemId,
      imageData: image.imageData,
      orderNumber: image.orderNumber,
      createdAt: image.createdAt,
    });
  }
}

// ── Conflicts ────────────────────────────────────────────────────────

function buildListConflict(current: ListRecord, incoming: ListRecord, changed: ListField[]): ConflictDetail {
  const message = changed.includes('name')
    ? `List name will change from '${current.name}' to '${incoming.name}'`
    : `List '${current.name}' will be updated`;
  return {
    type: 'listModified',
    entityName: current.name,
    entityId: current.id,
    currentValue: formatFields(current, changed),
    incomingValue: formatFields(incoming, changed),
    message,
  };
}

function buildItemConflict(current: ItemRecord, incoming: ItemRecord, changed: ItemField[]): ConflictDetail {
  const message = changed.includes('title')
    ? `Item '${current.title}' will be renamed to '${incoming.title}'`
    : `Item '${current.title}' will be updated`;
  return {
    type: 'itemModified',
    entityName: current.title,
    entityId: current.id,
    currentValue: formatFields(current, changed),
    incomingValue: formatFields(incoming, changed),
    message,
  };
}

export function reconcile(input: ReconcileInput): ChangeSet {
  return new ReconciliationRun(input).run();
}
