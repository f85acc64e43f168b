/**
 * Pre-flight validation of a decoded entity graph.
 *
 * Pure function. Every check runs and every failure is collected, so the
 * caller can show the full list at once.
 */

import { isValidDate } from '@listsync/shared';
import { SUPPORTED_EXPORT_VERSIONS } from './schema-codec';
import type { ExportData, ValidationIssue } from './types';

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

export function validateExportData(graph: ExportData): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  // ── Envelope ──
  if (isBlank(graph.version)) {
    issues.push({ field: 'version', code: 'MISSING_VERSION', message: 'Export version is missing' });
  } else if (!SUPPORTED_EXPORT_VERSIONS.includes(graph.version)) {
    issues.push({
      field: 'version',
      code: 'UNSUPPORTED_VERSION',
      message: `Unsupported version: ${graph.version}`,
    });
  }

  if (!isValidDate(graph.exportDate)) {
    issues.push({
      field: 'exportDate',
      code: 'INVALID_EXPORT_DATE',
      message: 'Export date is missing or not a valid date',
    });
  }

  // ── Lists & items ──
  const seenListIds = new Set<string>();
  graph.lists.forEach((list, listIdx) => {
    const listPath = `lists.${listIdx}`;
    const listLabel = isBlank(list.name) ? `#${listIdx + 1}` : `'${list.name}'`;

    if (isBlank(list.name)) {
      issues.push({
        field: `${listPath}.name`,
        code: 'EMPTY_LIST_NAME',
        message: `List name cannot be empty (list ${listLabel})`,
      });
    }

    if (seenListIds.has(list.id)) {
      issues.push({
        field: `${listPath}.id`,
        code: 'DUPLICATE_LIST_ID',
        message: `List id ${list.id} appears more than once`,
      });
    }
    seenListIds.add(list.id);

    list.items.forEach((item, itemIdx) => {
      const itemPath = `${listPath}.items.${itemIdx}`;

      if (isBlank(item.title)) {
        issues.push({
          field: `${itemPath}.title`,
          code: 'EMPTY_ITEM_TITLE',
          message: `Item title cannot be empty in list ${listLabel}`,
        });
      }

      if (!Number.isInteger(item.quantity) || item.quantity < 1) {
        issues.push({
          field: `${itemPath}.quantity`,
          code: 'INVALID_QUANTITY',
          message: `Item quantity must be at least 1 in list ${listLabel} (got ${item.quantity})`,
        });
      }

      if (item.listId !== list.id) {
        issues.push({
          field: `${itemPath}.listId`,
          code: 'ORPHAN_ITEM',
          message: `Item ${item.id} does not belong to list ${listLabel}`,
        });
      }
    });
  });

  return issues;
}
