/**
 * Export of the store's lists, the producing side of the import formats.
 *
 * JSON output goes through the same codec the importer decodes with; the
 * plain-text output uses the checkbox + `(×N)` line grammar the text
 * parser understands. CSV is export-only, for spreadsheets.
 */

import type { EntityStore } from '../import/entity-store';
import { CURRENT_EXPORT_VERSION, encodeExportData } from '../import/schema-codec';
import type { EncodeOptions } from '../import/schema-codec';
import type { ExportData, List } from '../import/types';

export interface ExportOptions {
  includeArchived?: boolean;
  now?: Date;
}

export async function exportAllData(store: EntityStore, options: ExportOptions = {}): Promise<ExportData> {
  const all = await store.findAllLists();
  return {
    version: CURRENT_EXPORT_VERSION,
    exportDate: options.now ?? new Date(),
    lists: options.includeArchived === false ? all.filter((l) => !l.isArchived) : all,
  };
}

export async function exportToJson(
  store: EntityStore,
  options: ExportOptions & EncodeOptions = {},
): Promise<string> {
  const data = await exportAllData(store, options);
  return encodeExportData(data, { pretty: options.pretty });
}

// ── Plain Text ───────────────────────────────────────────────────────

export interface PlainTextOptions {
  includeCrossedOutItems?: boolean;
  includeQuantities?: boolean;
}

export function formatListAsPlainText(list: List, options: PlainTextOptions = {}): string {
  const { includeCrossedOutItems = true, includeQuantities = true } = options;

  const items = [...list.items]
    .sort((a, b) => a.orderNumber - b.orderNumber)
    .filter((item) => includeCrossedOutItems || !item.isCrossedOut);

  const lines: string[] = [];
  for (const item of items) {
    let line = `${item.isCrossedOut ? '[✓]' : '[ ]'} ${item.title}`;
    if (includeQuantities && item.quantity > 1) {
      line += ` (×${item.quantity})`;
    }
    lines.push(line);
  }

  return lines.join('\n');
}

export interface PlainTextFile {
  fileName: string;
  content: string;
}

function fileSlug(name: string): string {
  return (
    name
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '') || 'list'
  );
}

/**
 * One file per list. The list name lives only in the file name: any line in
 * the body would be read back as an item.
 */
export async function exportListsAsPlainText(
  store: EntityStore,
  options: ExportOptions & PlainTextOptions = {},
): Promise<PlainTextFile[]> {
  const data = await exportAllData(store, options);
  return data.lists.map((list, index) => ({
    fileName: `${String(index + 1).padStart(2, '0')}-${fileSlug(list.name)}.txt`,
    content: formatListAsPlainText(list, options),
  }));
}

// ── CSV ──────────────────────────────────────────────────────────────

export const CSV_HEADER = ['List Name', 'Item Title', 'Description', 'Quantity', 'Crossed Out', 'Created Date'];

/** RFC 4180 quoting: only fields with a comma, quote or line break. */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** One row per item, lists in display order; every row ends with a newline. */
export async function exportToCsv(store: EntityStore, options: ExportOptions = {}): Promise<string> {
  const data = await exportAllData(store, options);
  const rows: string[][] = [CSV_HEADER];

  for (const list of data.lists) {
    for (const item of [...list.items].sort((a, b) => a.orderNumber - b.orderNumber)) {
      rows.push([
        list.name,
        item.title,
        item.description ?? '',
        String(item.quantity),
        item.isCrossedOut ? 'Yes' : 'No',
        item.createdAt.toISOString(),
      ]);
    }
  }

  return rows.map((row) => row.map(escapeCsvField).join(',') + '\n').join('');
}
