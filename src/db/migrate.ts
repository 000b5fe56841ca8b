import type Database from 'better-sqlite3';

/** Idempotent DDL matching `schema.ts`. */
const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    slug TEXT NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sku TEXT UNIQUE,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    price TEXT NOT NULL,
    category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
    available INTEGER NOT NULL DEFAULT 1,
    shop_id INTEGER NOT NULL,
    shop_name TEXT NOT NULL,
    shop_lat REAL,
    shop_lng REAL,
    tags TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_products_shop_id ON products(shop_id)',
  'CREATE INDEX IF NOT EXISTS idx_products_category_id ON products(category_id)',
  `CREATE TABLE IF NOT EXISTS product_images (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
    image TEXT NOT NULL,
    alt_text TEXT NOT NULL DEFAULT ''
  )`,
  'CREATE INDEX IF NOT EXISTS idx_product_images_product_id ON product_images(product_id)',
];

export function runMigrations(sqlite: Database.Database): void {
  sqlite.transaction(() => {
    for (const statement of STATEMENTS) {
      sqlite.exec(statement);
    }
  })();
}
