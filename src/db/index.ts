/**
 * ✅ Drizzle ORM Database Setup
 * SQLite database using better-sqlite3
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import * as schema from './schema';
import { runMigrations } from './migrate';

export type CatalogDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: CatalogDatabase;
  close(): void;
}

/**
 * Opens (or creates) the catalog database and brings the schema up to date.
 * Pass `':memory:'` for a throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    const dataDir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  runMigrations(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
