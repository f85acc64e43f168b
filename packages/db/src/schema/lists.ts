import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  integer,
  index,
} from 'drizzle-orm/pg-core';

// ── Lists ──────────────────────────────────────────────────────────
export const lists = pgTable(
  'lists',
  {
    id: uuid('id').primaryKey(),
    name: text('name').notNull(),
    orderNumber: integer('order_number').notNull().default(0),
    isArchived: boolean('is_archived').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    modifiedAt: timestamp('modified_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_lists_order').on(table.orderNumber)],
);

// ── Items ──────────────────────────────────────────────────────────
export const items = pgTable(
  'items',
  {
    id: uuid('id').primaryKey(),
    listId: uuid('list_id')
      .notNull()
      .references(() => lists.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    description: text('description'),
    quantity: integer('quantity').notNull().default(1),
    orderNumber: integer('order_number').notNull().default(0),
    isCrossedOut: boolean('is_crossed_out').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    modifiedAt: timestamp('modified_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_items_list').on(table.listId, table.orderNumber)],
);

// ── Item Images ────────────────────────────────────────────────────
// Image bytes are stored base64-encoded, the same representation the
// export format uses.
export const itemImages = pgTable(
  'item_images',
  {
    id: uuid('id').primaryKey(),
    itemId: uuid('item_id')
      .notNull()
      .references(() => items.id, { onDelete: 'cascade' }),
    imageData: text('image_data').notNull(),
    orderNumber: integer('order_number').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_item_images_item').on(table.itemId, table.orderNumber)],
);

export type ListRow = typeof lists.$inferSelect;
export type ItemRow = typeof items.$inferSelect;
export type ItemImageRow = typeof itemImages.$inferSelect;
