import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { itemImages, items, lists } from '../schema';

describe('lists schema', () => {
  it('maps camelCase fields to snake_case columns', () => {
    const config = getTableConfig(lists);
    expect(config.name).toBe('lists');
    expect(config.columns.map((c) => c.name)).toEqual([
      'id',
      'name',
      'order_number',
      'is_archived',
      'created_at',
      'modified_at',
    ]);
  });

  it('indexes lists by display order', () => {
    expect(getTableConfig(lists).indexes.map((i) => i.config.name)).toEqual(['idx_lists_order']);
  });
});

describe('items schema', () => {
  it('allows a null description and nothing else', () => {
    const nullable = getTableConfig(items)
      .columns.filter((c) => !c.notNull)
      .map((c) => c.name);
    expect(nullable).toEqual(['description']);
  });

  it('cascades deletes from lists', () => {
    const [fk] = getTableConfig(items).foreignKeys;
    expect(fk?.onDelete).toBe('cascade');
    expect(fk?.reference().foreignTable).toBe(lists);
  });
});

describe('item_images schema', () => {
  it('cascades deletes from items', () => {
    const [fk] = getTableConfig(itemImages).foreignKeys;
    expect(fk?.onDelete).toBe('cascade');
    expect(fk?.reference().foreignTable).toBe(items);
  });

  it('stores image bytes as text', () => {
    const column = getTableConfig(itemImages).columns.find((c) => c.name === 'image_data');
    expect(column?.getSQLType()).toBe('text');
    expect(column?.notNull).toBe(true);
  });
});
