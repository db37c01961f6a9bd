/**
 * Database Migration Runner
 *
 * Applies pending Drizzle migrations to the configured SQLite database.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 *
 * Running it repeatedly is safe; only new migrations are applied.
 */

import { config } from '../config';
import { closeDatabase, createDatabase, MIGRATIONS_FOLDER, runMigrations } from './db';

const dbPath = config.database.path;

console.log(`[migrate] Database path: ${dbPath}`);
console.log(`[migrate] Migrations folder: ${MIGRATIONS_FOLDER}`);

const db = createDatabase(dbPath);

try {
  runMigrations(db);
  console.log('[migrate] Migrations completed successfully.');

  const tables = db.$client
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name != '__drizzle_migrations' ORDER BY name"
    )
    .pluck()
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${String(table)}`);
  }

  const foreignKeys = db.$client.pragma('foreign_keys', { simple: true });
  console.log(`[migrate] Foreign key enforcement: ${foreignKeys === 1 ? 'ENABLED' : 'DISABLED'}`);
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exitCode = 1;
} finally {
  closeDatabase(db);
}
