/**
 * Postgres-backed entity store.
 *
 * Writes go through one `db.transaction()`, so a failed commit leaves the
 * tables exactly as they were.
 */

import { asc, eq } from 'drizzle-orm';
import { lists, items, itemImages } from '@listsync/db';
import type { Database, DbExecutor, ItemImageRow, ItemRow, ListRow } from '@listsync/db';
import type { EntityStore, EntityStoreWriter } from './entity-store';
import type { Item, ItemImageRecord, ItemRecord, List, ListRecord } from './types';

function decodeImageData(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

function encodeImageData(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/** Group flat rows (already in display order) into the list → item → image graph. */
export function assembleLists(listRows: ListRow[], itemRows: ItemRow[], imageRows: ItemImageRow[]): List[] {
  const imagesByItem = new Map<string, ItemImageRecord[]>();
  for (const row of imageRows) {
    const bucket = imagesByItem.get(row.itemId) ?? [];
    bucket.push({
      id: row.id,
      itemId: row.itemId,
      imageData: decodeImageData(row.imageData),
      orderNumber: row.orderNumber,
      createdAt: row.createdAt,
    });
    imagesByItem.set(row.itemId, bucket);
  }

  const itemsByList = new Map<string, Item[]>();
  for (const row of itemRows) {
    const bucket = itemsByList.get(row.listId) ?? [];
    bucket.push({
      id: row.id,
      listId: row.listId,
      title: row.title,
      description: row.description,
      quantity: row.quantity,
      orderNumber: row.orderNumber,
      isCrossedOut: row.isCrossedOut,
      createdAt: row.createdAt,
      modifiedAt: row.modifiedAt,
      images: imagesByItem.get(row.id) ?? [],
    });
    itemsByList.set(row.listId, bucket);
  }

  return listRows.map((row) => ({
    id: row.id,
    name: row.name,
    orderNumber: row.orderNumber,
    isArchived: row.isArchived,
    createdAt: row.createdAt,
    modifiedAt: row.modifiedAt,
    items: itemsByList.get(row.id) ?? [],
  }));
}

class DrizzleEntityWriter implements EntityStoreWriter {
  constructor(private readonly tx: DbExecutor) {}

  async createList(list: ListRecord): Promise<void> {
    await this.tx.insert(lists).values({ ...list });
  }

  async updateList(list: ListRecord): Promise<void> {
    await this.tx
      .update(lists)
      .set({
        name: list.name,
        orderNumber: list.orderNumber,
        isArchived: list.isArchived,
        modifiedAt: list.modifiedAt,
      })
      .where(eq(lists.id, list.id));
  }

  async deleteList(id: string): Promise<void> {
    await this.tx.delete(lists).where(eq(lists.id, id));
  }

  async createItem(item: ItemRecord): Promise<void> {
    await this.tx.insert(items).values({ ...item });
  }

  async updateItem(item: ItemRecord): Promise<void> {
    await this.tx
      .update(items)
      .set({
        title: item.title,
        description: item.description,
        quantity: item.quantity,
        orderNumber: item.orderNumber,
        isCrossedOut: item.isCrossedOut,
        modifiedAt: item.modifiedAt,
      })
      .where(eq(items.id, item.id));
  }

  async deleteItem(id: string): Promise<void> {
    await this.tx.delete(items).where(eq(items.id, id));
  }

  async createImage(image: ItemImageRecord): Promise<void> {
    await this.tx.insert(itemImages).values({
      id: image.id,
      itemId: image.itemId,
      imageData: encodeImageData(image.imageData),
      orderNumber: image.orderNumber,
      createdAt: image.createdAt,
    });
  }

  async deleteImage(id: string): Promise<void> {
    await this.tx.delete(itemImages).where(eq(itemImages.id, id));
  }
}

export class DrizzleEntityStore implements EntityStore {
  constructor(private readonly db: Database) {}

  async findAllLists(): Promise<List[]> {
    const [listRows, itemRows, imageRows] = await Promise.all([
      this.db.select().from(lists).orderBy(asc(lists.orderNumber), asc(lists.createdAt)),
      this.db.select().from(items).orderBy(asc(items.orderNumber), asc(items.createdAt)),
      this.db.select().from(itemImages).orderBy(asc(itemImages.orderNumber)),
    ]);
    return assembleLists(listRows, itemRows, imageRows);
  }

  transaction<T>(work: (writer: EntityStoreWriter) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleEntityWriter(tx)));
  }
}
