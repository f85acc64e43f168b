import type { ItemImageRecord, ItemRecord, List, ListRecord } from './types';

/**
 * Write side of the entity store, only reachable inside a transaction.
 */
export interface EntityStoreWriter {
  createList(list: ListRecord): Promise<void>;
  updateList(list: ListRecord): Promise<void>;
  deleteList(id: string): Promise<void>;
  createItem(item: ItemRecord): Promise<void>;
  updateItem(item: ItemRecord): Promise<void>;
  deleteItem(id: string): Promise<void>;
  createImage(image: ItemImageRecord): Promise<void>;
  deleteImage(id: string): Promise<void>;
}

/**
 * The repository that owns lists, items and images.
 *
 * `transaction` must be atomic: when `work` rejects, none of its writes
 * may be visible afterwards.
 */
export interface EntityStore {
  /** Every list with its items and images, in display order. */
  findAllLists(): Promise<List[]>;
  transaction<T>(work: (writer: EntityStoreWriter) => Promise<T>): Promise<T>;
}
