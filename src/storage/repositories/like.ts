import { sql, type SQL } from 'drizzle-orm';
import type { SQLiteColumn } from 'drizzle-orm/sqlite-core';

/**
 * Escapes LIKE wildcards so user text matches literally.
 */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/** Case-insensitive (ASCII) "starts with" match */
export function startsWith(column: SQLiteColumn, prefix: string): SQL {
  return sql`${column} LIKE ${`${escapeLike(prefix)}%`} ESCAPE '\\'`;
}

/** Case-insensitive (ASCII) substring match */
export function contains(column: SQLiteColumn, query: string): SQL {
  return sql`${column} LIKE ${`%${escapeLike(query)}%`} ESCAPE '\\'`;
}
