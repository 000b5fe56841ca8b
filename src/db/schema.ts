/**
 * ✅ Drizzle Schema
 * Catalog tables for SQLite
 */

import { integer, real, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';

export const categories = sqliteTable('categories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  slug: text('slug').notNull().unique(),
});

export const products = sqliteTable('products', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sku: text('sku').unique(),
  name: text('name').notNull(),
  description: text('description').notNull().default(''),
  // decimal kept as its canonical two-place string
  price: text('price').notNull(),
  categoryId: integer('category_id').references(() => categories.id, { onDelete: 'set null' }),
  available: integer('available', { mode: 'boolean' }).notNull().default(true),
  shopId: integer('shop_id').notNull(),
  shopName: text('shop_name').notNull(),
  shopLat: real('shop_lat'),
  shopLng: real('shop_lng'),
  tags: text('tags', { mode: 'json' }).$type<string[]>().notNull().default([]),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => ({
  shopIdIdx: index('idx_products_shop_id').on(table.shopId),
  categoryIdx: index('idx_products_category_id').on(table.categoryId),
}));

export const productImages = sqliteTable('product_images', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  productId: integer('product_id')
    .notNull()
    .references(() => products.id, { onDelete: 'cascade' }),
  image: text('image').notNull(),
  altText: text('alt_text').notNull().default(''),
}, (table) => ({
  productIdx: index('idx_product_images_product_id').on(table.productId),
}));

export type Category = typeof categories.$inferSelect;
export type NewCategory = typeof categories.$inferInsert;
export type Product = typeof products.$inferSelect;
export type NewProduct = typeof products.$inferInsert;
export type ProductImage = typeof productImages.$inferSelect;
export type NewProductImage = typeof productImages.$inferInsert;
