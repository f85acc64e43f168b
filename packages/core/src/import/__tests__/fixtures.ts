import type { EntityStore, EntityStoreWriter } from '../entity-store';
import type { InMemoryEntityStore } from '../in-memory-entity-store';
import type { ExportData, Item, ItemImage, List } from '../types';

export const T0 = new Date('2025-01-01T10:00:00.000Z');
export const T1 = new Date('2025-02-01T10:00:00.000Z');

/** Deterministic, valid v4-shaped UUID for test entities. */
export function testId(n: number): string {
  return `00000000-0000-4000-8000-${n.toString().padStart(12, '0')}`;
}

export function makeImage(overrides: Partial<ItemImage> = {}): ItemImage {
  return {
    id: testId(900),
    itemId: testId(100),
    imageData: new Uint8Array([1, 2, 3]),
    orderNumber: 0,
    createdAt: T0,
    ...overrides,
  };
}

export function makeItem(overrides: Partial<Item> = {}): Item {
  const id = overrides.id ?? testId(100);
  const item: Item = {
    id,
    listId: testId(1),
    title: 'Milk',
    description: null,
    quantity: 1,
    orderNumber: 0,
    isCrossedOut: false,
    createdAt: T0,
    modifiedAt: T0,
    images: [],
    ...overrides,
  };
  item.images = item.images.map((img) => ({ ...img, itemId: id }));
  return item;
}

export function makeList(overrides: Partial<List> = {}): List {
  const id = overrides.id ?? testId(1);
  return {
    id,
    name: 'Groceries',
    orderNumber: 0,
    isArchived: false,
    createdAt: T0,
    modifiedAt: T0,
    ...overrides,
    items: (overrides.items ?? []).map((item) => ({ ...item, listId: id })),
  };
}

export function makeExport(lists: List[], overrides: Partial<ExportData> = {}): ExportData {
  return { version: '1.0', exportDate: T1, lists, ...overrides };
}

function withHooks(writer: EntityStoreWriter, hooks: Partial<EntityStoreWriter>): EntityStoreWriter {
  return {
    createList: hooks.createList ?? ((list) => writer.createList(list)),
    updateList: hooks.updateList ?? ((list) => writer.updateList(list)),
    deleteList: hooks.deleteList ?? ((id) => writer.deleteList(id)),
    createItem: hooks.createItem ?? ((item) => writer.createItem(item)),
    updateItem: hooks.updateItem ?? ((item) => writer.updateItem(item)),
    deleteItem: hooks.deleteItem ?? ((id) => writer.deleteItem(id)),
    createImage: hooks.createImage ?? ((image) => writer.createImage(image)),
    deleteImage: hooks.deleteImage ?? ((id) => writer.deleteImage(id)),
  };
}

/** Wraps an in-memory store so individual writer calls can be replaced. */
export class HookedStore implements EntityStore {
  constructor(
    private readonly inner: InMemoryEntityStore,
    private readonly hooks: Partial<EntityStoreWriter>,
  ) {}

  findAllLists(): Promise<List[]> {
    return this.inner.findAllLists();
  }

  transaction<T>(work: (writer: EntityStoreWriter) => Promise<T>): Promise<T> {
    return this.inner.transaction((writer) => work(withHooks(writer, this.hooks)));
  }
}
