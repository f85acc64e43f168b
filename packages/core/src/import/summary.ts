import type { ImportPreview, ImportResult } from './types';

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/** One-line outcome for a toast or CLI, e.g. "Imported 2 lists and 5 items (updated 1 existing)". */
export function formatImportSummary(result: ImportResult): string {
  let message = `Imported ${plural(result.listsCreated, 'list')} and ${plural(result.itemsCreated, 'item')}`;
  const updated = result.listsUpdated + result.itemsUpdated;
  if (updated > 0) {
    message += ` (updated ${updated} existing)`;
  }
  if (!result.wasSuccessful) {
    message += `, ${plural(result.errors.length, 'error')}`;
  }
  return message;
}

export function formatPreviewSummary(preview: ImportPreview): string {
  if (preview.totalChanges === 0) return 'No changes to import';
  const parts = [
    `${plural(preview.listsToCreate, 'new list')}`,
    `${plural(preview.listsToUpdate, 'updated list')}`,
    `${plural(preview.itemsToCreate, 'new item')}`,
    `${plural(preview.itemsToUpdate, 'updated item')}`,
  ];
  let message = parts.join(', ');
  if (preview.hasConflicts) {
    message += ` — ${plural(preview.conflicts.length, 'conflict')}`;
  }
  return message;
}
