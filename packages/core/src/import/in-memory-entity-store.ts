import { NotFoundError } from '@listsync/shared';
import type { EntityStore, EntityStoreWriter } from './entity-store';
import type { Item, ItemImageRecord, ItemRecord, List, ListRecord } from './types';

interface StoreState {
  lists: Map<string, ListRecord>;
  items: Map<string, ItemRecord>;
  images: Map<string, ItemImageRecord>;
}

function cloneState(state: StoreState): StoreState {
  return {
    lists: new Map(state.lists),
    items: new Map(state.items),
    images: new Map(state.images),
  };
}

function byOrderNumber(a: { orderNumber: number }, b: { orderNumber: number }): number {
  return a.orderNumber - b.orderNumber;
}

class InMemoryEntityWriter implements EntityStoreWriter {
  constructor(private readonly state: StoreState) {}

  async createList(list: ListRecord): Promise<void> {
    if (this.state.lists.has(list.id)) {
      throw new Error(`duplicate key: list ${list.id} already exists`);
    }
    this.state.lists.set(list.id, { ...list });
  }

  async updateList(list: ListRecord): Promise<void> {
    if (!this.state.lists.has(list.id)) throw new NotFoundError('List', list.id);
    this.state.lists.set(list.id, { ...list });
  }

  async deleteList(id: string): Promise<void> {
    for (const item of [...this.state.items.values()]) {
      if (item.listId === id) await this.deleteItem(item.id);
    }
    this.state.lists.delete(id);
  }

  async createItem(item: ItemRecord): Promise<void> {
    if (this.state.items.has(item.id)) {
      throw new Error(`duplicate key: item ${item.id} already exists`);
    }
    if (!this.state.lists.has(item.listId)) throw new NotFoundError('List', item.listId);
    this.state.items.set(item.id, { ...item });
  }

  async updateItem(item: ItemRecord): Promise<void> {
    if (!this.state.items.has(item.id)) throw new NotFoundError('Item', item.id);
    this.state.items.set(item.id, { ...item });
  }

  async deleteItem(id: string): Promise<void> {
    for (const image of [...this.state.images.values()]) {
      if (image.itemId === id) this.state.images.delete(image.id);
    }
    this.state.items.delete(id);
  }

  async createImage(image: ItemImageRecord): Promise<void> {
    if (this.state.images.has(image.id)) {
      throw new Error(`duplicate key: image ${image.id} already exists`);
    }
    if (!this.state.items.has(image.itemId)) throw new NotFoundError('Item', image.itemId);
    this.state.images.set(image.id, { ...image, imageData: image.imageData.slice() });
  }

  async deleteImage(id: string): Promise<void> {
    this.state.images.delete(id);
  }
}

/**
 * Process-local entity store. Transactions write to a copy of the state
 * and swap it in only when the work resolves.
 */
export class InMemoryEntityStore implements EntityStore {
  private state: StoreState = { lists: new Map(), items: new Map(), images: new Map() };

  constructor(seed: List[] = []) {
    for (const list of seed) {
      const { items, ...listRecord } = list;
      this.state.lists.set(list.id, { ...listRecord });
      for (const item of items) {
        const { images, ...itemRecord } = item;
        this.state.items.set(item.id, { ...itemRecord, listId: list.id });
        for (const image of images) {
          this.state.images.set(image.id, { ...image, itemId: item.id });
        }
      }
    }
  }

  async findAllLists(): Promise<List[]> {
    const itemsByList = new Map<string, Item[]>();
    const sortedItems = [...this.state.items.values()].sort(byOrderNumber);
    const sortedImages = [...this.state.images.values()].sort(byOrderNumber);

    for (const record of sortedItems) {
      const item: Item = {
        ...record,
        images: sortedImages
          .filter((img) => img.itemId === record.id)
          .map((img) => ({ ...img, imageData: img.imageData.slice() })),
      };
      const bucket = itemsByList.get(record.listId) ?? [];
      bucket.push(item);
      itemsByList.set(record.listId, bucket);
    }

    return [...this.state.lists.values()]
      .sort(byOrderNumber)
      .map((record) => ({ ...record, items: itemsByList.get(record.id) ?? [] }));
  }

  async transaction<T>(work: (writer: EntityStoreWriter) => Promise<T>): Promise<T> {
    const draft = cloneState(this.state);
    const result = await work(new InMemoryEntityWriter(draft));
    this.state = draft;
    return result;
  }

  get counts(): { lists: number; items: number; images: number } {
    return {
      lists: this.state.lists.size,
      items: this.state.items.size,
      images: this.state.images.size,
    };
  }
}
