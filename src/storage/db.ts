/**
 * Database Connection Factory
 *
 * Opens a better-sqlite3 connection wrapped in Drizzle ORM, with foreign key
 * enforcement on.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const db = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:');
 */

import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import * as schema from './schema';

/** Location of the generated SQL migrations */
export const MIGRATIONS_FOLDER = resolve(dirname(fileURLToPath(import.meta.url)), '../../drizzle');

/**
 * Creates a Drizzle database over the SQLite file at `dbPath`, creating the
 * parent directory if needed. Use ':memory:' for tests.
 *
 * SQLite ships with foreign keys disabled; they are turned on here so that
 * deleting an opening cascades to its cards, reviews, notes and evaluations.
 */
export function createDatabase(dbPath: string) {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(resolve(dbPath)), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('foreign_keys = ON');

  return drizzle(sqlite, { schema });
}

export type AppDatabase = ReturnType<typeof createDatabase>;

/**
 * Applies pending migrations. Safe to call on every start: applied
 * migrations are tracked in __drizzle_migrations.
 */
export function runMigrations(db: AppDatabase, migrationsFolder: string = MIGRATIONS_FOLDER): void {
  migrate(db, { migrationsFolder });
}

/**
 * Opens the database and brings its schema up to date.
 */
export function openDatabase(dbPath: string): AppDatabase {
  const db = createDatabase(dbPath);
  runMigrations(db);
  return db;
}

export function closeDatabase(db: AppDatabase): void {
  db.$client.close();
}
