/**
 * Free-text list parser.
 *
 * Turns pasted notes, chat messages or another app's plain-text export into
 * candidate items: one per non-blank line, with an optional prefix (bullet,
 * numbering or checkbox) and an optional `(×N)` quantity suffix.
 */

import { generateUuid } from '@listsync/shared';
import { CURRENT_EXPORT_VERSION } from './schema-codec';
import type { ExportData, Item, ParsedTextItem } from './types';

// ── Line Grammar ─────────────────────────────────────────────────────

const BULLET_MARKERS = new Set(['•', '-', '*', '✓', '✔', '☐', '☑', '▪', '▸', '→']);
const NUMBERED_PREFIX_RE = /^\d+[.):]\s*/;
const CHECKBOX_RE = /^\[([ xX✓]?)\]\s*/;
const CHECKED_MARKS = new Set(['x', 'X', '✓']);
const QUANTITY_SUFFIX_RE = /\s*\(×(\d+)\)\s*$/;

function parseQuantity(digits: string | undefined): number {
  if (digits === undefined) return 1;
  const n = Number.parseInt(digits, 10);
  return Number.isSafeInteger(n) && n >= 1 ? n : 1;
}

/** Parse one line; `null` for blank lines. */
export function parseTextLine(line: string): ParsedTextItem | null {
  let rest = line.trim();
  if (!rest) return null;

  let isCrossedOut = false;

  // Prefixes are mutually exclusive: first match wins.
  const firstChar = rest.charAt(0);
  const numbered = NUMBERED_PREFIX_RE.exec(rest);
  const checkbox = CHECKBOX_RE.exec(rest);
  if (BULLET_MARKERS.has(firstChar)) {
    rest = rest.slice(firstChar.length).trim();
  } else if (numbered) {
    rest = rest.slice(numbered[0].length);
  } else if (checkbox) {
    isCrossedOut = CHECKED_MARKS.has(checkbox[1] ?? '');
    rest = rest.slice(checkbox[0].length);
  }

  let quantity = 1;
  const suffix = QUANTITY_SUFFIX_RE.exec(rest);
  if (suffix) {
    quantity = parseQuantity(suffix[1]);
    rest = rest.slice(0, suffix.index);
  }

  return { title: rest.trim(), isCrossedOut, quantity };
}

export function parsePlainText(text: string): ParsedTextItem[] {
  const result: ParsedTextItem[] = [];
  for (const line of text.split(/\r\n|\r|\n/)) {
    const parsed = parseTextLine(line);
    if (parsed) result.push(parsed);
  }
  return result;
}

// ── Graph Construction ───────────────────────────────────────────────

export interface TextImportGraphOptions {
  listName: string;
  now?: Date;
}

/**
 * Wrap parsed lines into a one-list export graph so free text goes through
 * the same validation and reconciliation as a structured file.
 */
export function buildTextImportGraph(
  parsed: ParsedTextItem[],
  options: TextImportGraphOptions,
): ExportData {
  const now = options.now ?? new Date();
  const listId = generateUuid();

  const items: Item[] = parsed.map((p, index) => ({
    id: generateUuid(),
    listId,
    title: p.title,
    description: null,
    quantity: p.quantity,
    orderNumber: index,
    isCrossedOut: p.isCrossedOut,
    createdAt: now,
    modifiedAt: now,
    images: [],
  }));

  return {
    version: CURRENT_EXPORT_VERSION,
    exportDate: now,
    lists: [
      {
        id: listId,
        name: options.listName,
        orderNumber: 0,
        isArchived: false,
        createdAt: now,
        modifiedAt: now,
        items,
      },
    ],
  };
}
