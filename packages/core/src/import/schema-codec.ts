/**
 * Codec for the structured export format (`ExportData`).
 *
 * Decoding validates shape and types with zod and reports the JSON path of
 * the first offending field. Semantic checks (empty names, quantities) are
 * left to the graph validator so they can be skipped on request.
 */

import { z } from 'zod';
import { describeZodError } from '@listsync/shared';
import { ImportError } from './import-error';
import type { ExportData, Item, ItemImage, List } from './types';

export const CURRENT_EXPORT_VERSION = '1.0';
export const SUPPORTED_EXPORT_VERSIONS: readonly string[] = [CURRENT_EXPORT_VERSION];

// ── Wire Schemas ─────────────────────────────────────────────────────

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Integer fields are stored in 32-bit integer columns. */
const int32Schema = z.number().int().min(-2147483648).max(2147483647);

const isoDateSchema = z
  .string()
  .datetime({ offset: true, message: 'Expected an ISO-8601 timestamp' })
  .transform((value) => new Date(value));

const imageDataSchema = z
  .string()
  .regex(BASE64_RE, 'Expected base64-encoded image data')
  .transform((value) => new Uint8Array(Buffer.from(value, 'base64')));

const wireImageSchema = z.object({
  id: z.string().uuid(),
  imageData: imageDataSchema,
  orderNumber: int32Schema,
  createdAt: isoDateSchema,
});

const wireItemSchema = z.object({
  id: z.string().uuid(),
  title: z.string(),
  description: z
    .string()
    .nullable()
    .optional()
    .transform((value) => value ?? null),
  quantity: int32Schema,
  orderNumber: int32Schema,
  isCrossedOut: z.boolean(),
  createdAt: isoDateSchema,
  modifiedAt: isoDateSchema,
  images: z.array(wireImageSchema).optional().default([]),
});

const wireListSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  orderNumber: int32Schema,
  isArchived: z.boolean(),
  createdAt: isoDateSchema,
  modifiedAt: isoDateSchema,
  items: z.array(wireItemSchema).optional().default([]),
});

export const exportDataSchema = z.object({
  version: z.string(),
  exportDate: isoDateSchema,
  lists: z.array(wireListSchema),
});

type WireList = z.output<typeof wireListSchema>;
type WireItem = z.output<typeof wireItemSchema>;

// ── Decode ───────────────────────────────────────────────────────────

function toItem(wire: WireItem, listId: string): Item {
  const images: ItemImage[] = wire.images.map((img) => ({
    id: img.id,
    itemId: wire.id,
    imageData: img.imageData,
    orderNumber: img.orderNumber,
    createdAt: img.createdAt,
  }));
  return {
    id: wire.id,
    listId,
    title: wire.title,
    description: wire.description,
    quantity: wire.quantity,
    orderNumber: wire.orderNumber,
    isCrossedOut: wire.isCrossedOut,
    createdAt: wire.createdAt,
    modifiedAt: wire.modifiedAt,
    images,
  };
}

function toList(wire: WireList): List {
  return {
    id: wire.id,
    name: wire.name,
    orderNumber: wire.orderNumber,
    isArchived: wire.isArchived,
    createdAt: wire.createdAt,
    modifiedAt: wire.modifiedAt,
    items: wire.items.map((item) => toItem(item, wire.id)),
  };
}

export function decodeExportData(text: string): ExportData {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw ImportError.invalidFormat(`malformed JSON (${msg})`);
  }

  const parsed = exportDataSchema.safeParse(json);
  if (!parsed.success) {
    throw ImportError.decodingFailed(describeZodError(parsed.error));
  }

  return {
    version: parsed.data.version,
    exportDate: parsed.data.exportDate,
    lists: parsed.data.lists.map(toList),
  };
}

// ── Encode ───────────────────────────────────────────────────────────

export interface EncodeOptions {
  pretty?: boolean;
}

function encodeImage(image: ItemImage) {
  return {
    id: image.id,
    imageData: Buffer.from(image.imageData).toString('base64'),
    orderNumber: image.orderNumber,
    createdAt: image.createdAt.toISOString(),
  };
}

function encodeItem(item: Item) {
  return {
    id: item.id,
    title: item.title,
    description: item.description,
    quantity: item.quantity,
    orderNumber: item.orderNumber,
    isCrossedOut: item.isCrossedOut,
    createdAt: item.createdAt.toISOString(),
    modifiedAt: item.modifiedAt.toISOString(),
    images: item.images.map(encodeImage),
  };
}

function encodeList(list: List) {
  return {
    id: list.id,
    name: list.name,
    orderNumber: list.orderNumber,
    isArchived: list.isArchived,
    createdAt: list.createdAt.toISOString(),
    modifiedAt: list.modifiedAt.toISOString(),
    items: list.items.map(encodeItem),
  };
}

export function encodeExportData(data: ExportData, options: EncodeOptions = {}): string {
  const wire = {
    version: data.version,
    exportDate: data.exportDate.toISOString(),
    lists: data.lists.map(encodeList),
  };
  return JSON.stringify(wire, null, options.pretty ? 2 : undefined);
}
