import type { ChangeSet, ImportPreview, ImportResult, InputFormat } from './types';

export function buildImportPreview(changeSet: ChangeSet, format: InputFormat): ImportPreview {
  const listsToCreate = changeSet.listsToCreate.length;
  const listsToUpdate = changeSet.listsToUpdate.length;
  const itemsToCreate = changeSet.itemsToCreate.length;
  const itemsToUpdate = changeSet.itemsToUpdate.length;
  return {
    strategy: changeSet.strategy,
    format,
    listsToCreate,
    listsToUpdate,
    itemsToCreate,
    itemsToUpdate,
    conflicts: [...changeSet.conflicts],
    errors: [...changeSet.errors],
    totalChanges: listsToCreate + listsToUpdate + itemsToCreate + itemsToUpdate,
    hasConflicts: changeSet.conflicts.length > 0,
    isValid: changeSet.errors.length === 0,
  };
}

export function buildImportResult(
  changeSet: ChangeSet,
  context: { importId: string; format: InputFormat },
): ImportResult {
  const listsCreated = changeSet.listsToCreate.length;
  const listsUpdated = changeSet.listsToUpdate.length;
  const itemsCreated = changeSet.itemsToCreate.length;
  const itemsUpdated = changeSet.itemsToUpdate.length;
  return {
    importId: context.importId,
    strategy: changeSet.strategy,
    format: context.format,
    listsCreated,
    listsUpdated,
    itemsCreated,
    itemsUpdated,
    listsDeleted: changeSet.deletions.listIds.length,
    conflicts: [...changeSet.conflicts],
    errors: [...changeSet.errors],
    totalChanges: listsCreated + listsUpdated + itemsCreated + itemsUpdated,
    hasConflicts: changeSet.conflicts.length > 0,
    wasSuccessful: changeSet.errors.length === 0,
  };
}
