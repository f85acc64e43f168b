/**
 * Applies a reconciled change-set to the entity store.
 *
 * Everything runs inside one store transaction. For `replace` the
 * deletions land first (images → items → lists), then the creations; the
 * other strategies only create and update. Writes follow parent → child
 * order so foreign keys always resolve.
 */

import { errorMessage } from '@listsync/shared';
import type { EntityStore, EntityStoreWriter } from './entity-store';
import { ImportError, isImportError } from './import-error';
import { buildImportResult } from './results';
import type { ChangeSet, ImportResult, InputFormat } from './types';

export interface CommitContext {
  importId: string;
  format: InputFormat;
  signal?: AbortSignal;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw ImportError.cancelled();
}

async function applyDeletions(writer: EntityStoreWriter, changeSet: ChangeSet): Promise<void> {
  const { imageIds, itemIds, listIds } = changeSet.deletions;
  for (const id of imageIds) await writer.deleteImage(id);
  for (const id of itemIds) await writer.deleteItem(id);
  for (const id of listIds) await writer.deleteList(id);
}

async function applyWrites(writer: EntityStoreWriter, changeSet: ChangeSet): Promise<void> {
  for (const list of changeSet.listsToCreate) await writer.createList(list);
  for (const list of changeSet.listsToUpdate) await writer.updateList(list);
  for (const item of changeSet.itemsToCreate) await writer.createItem(item);
  for (const item of changeSet.itemsToUpdate) await writer.updateItem(item);
  for (const image of changeSet.imagesToCreate) await writer.createImage(image);
}

export async function commitChangeSet(
  store: EntityStore,
  changeSet: ChangeSet,
  context: CommitContext,
): Promise<ImportResult> {
  throwIfCancelled(context.signal);

  try {
    await store.transaction(async (writer) => {
      if (changeSet.strategy === 'replace') {
        await applyDeletions(writer, changeSet);
        throwIfCancelled(context.signal);
      }
      await applyWrites(writer, changeSet);
    });
  } catch (err: unknown) {
    if (isImportError(err)) throw err;
    throw ImportError.repositoryError(errorMessage(err));
  }

  return buildImportResult(changeSet, context);
}
