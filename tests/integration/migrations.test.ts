/**
 * Migration Metadata Tests
 *
 * drizzle-kit diffs the schema against the latest snapshot in drizzle/meta.
 * Every journal entry needs its SQL file and snapshot, and the latest
 * snapshot must describe src/storage/schema.ts, or the next
 * `npm run db:generate` re-creates tables that already exist.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { getTableConfig, type SQLiteTable } from 'drizzle-orm/sqlite-core';
import {
  evaluations,
  MIGRATIONS_FOLDER,
  openingNotes,
  openings,
  studyCards,
  studyReviews,
} from '../../src/storage';

const journalSchema = z.object({
  dialect: z.literal('sqlite'),
  entries: z.array(z.object({ idx: z.number(), tag: z.string() })).min(1),
});

const snapshotSchema = z.object({
  dialect: z.literal('sqlite'),
  id: z.string().uuid(),
  prevId: z.string().uuid(),
  tables: z.record(
    z.object({
      name: z.string(),
      columns: z.record(
        z.object({
          name: z.string(),
          type: z.string(),
          primaryKey: z.boolean(),
          notNull: z.boolean(),
          default: z.union([z.string(), z.number()]).optional(),
        })
      ),
      indexes: z.record(z.object({ name: z.string(), columns: z.array(z.string()), isUnique: z.boolean() })),
      foreignKeys: z.record(
        z.object({ tableFrom: z.string(), tableTo: z.string(), columnsFrom: z.array(z.string()), onDelete: z.string() })
      ),
    })
  ),
});

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function readJournal() {
  return journalSchema.parse(readJson(join(MIGRATIONS_FOLDER, 'meta', '_journal.json')));
}

function snapshotPath(idx: number): string {
  return join(MIGRATIONS_FOLDER, 'meta', `${String(idx).padStart(4, '0')}_snapshot.json`);
}

/** The parts of a table drizzle-kit compares, as read from the schema */
function describeTable(table: SQLiteTable) {
  const config = getTableConfig(table);
  return {
    name: config.name,
    columns: config.columns
      .map((column) => ({
        name: column.name,
        type: column.getSQLType(),
        primaryKey: column.primary,
        notNull: column.notNull,
      }))
      .sort((a, b) => a.name.localeCompare(b.name)),
    indexes: [
      ...config.indexes.map((index) => index.config.name),
      ...config.columns.filter((column) => column.isUnique).map((column) => column.uniqueName ?? ''),
    ].sort(),
    foreignKeys: config.foreignKeys.map((foreignKey) => getTableConfig(foreignKey.reference().foreignTable).name),
  };
}

describe('migrations', () => {
  it('has a SQL file and a snapshot for every journal entry', () => {
    for (const entry of readJournal().entries) {
      expect(existsSync(join(MIGRATIONS_FOLDER, `${entry.tag}.sql`))).toBe(true);
      expect(existsSync(snapshotPath(entry.idx))).toBe(true);
    }
  });

  it('chains each snapshot to the previous one', () => {
    let previousId = '00000000-0000-0000-0000-000000000000';
    for (const entry of readJournal().entries) {
      const snapshot = snapshotSchema.parse(readJson(snapshotPath(entry.idx)));
      expect(snapshot.prevId).toBe(previousId);
      previousId = snapshot.id;
    }
  });

  it('describes the current schema in the latest snapshot', () => {
    const entries = readJournal().entries;
    const latest = entries[entries.length - 1];
    const snapshot = snapshotSchema.parse(readJson(snapshotPath(latest.idx)));

    const fromSnapshot = Object.values(snapshot.tables)
      .map((table) => ({
        name: table.name,
        columns: Object.values(table.columns)
          .map(({ name, type, primaryKey, notNull }) => ({ name, type, primaryKey, notNull }))
          .sort((a, b) => a.name.localeCompare(b.name)),
        indexes: Object.keys(table.indexes).sort(),
        foreignKeys: Object.values(table.foreignKeys).map((foreignKey) => foreignKey.tableTo),
      }))
      .sort((a, b) => a.name.localeCompare(b.name));

    const fromSchema = [openings, studyCards, studyReviews, openingNotes, evaluations]
      .map(describeTable)
      .sort((a, b) => a.name.localeCompare(b.name));

    expect(fromSnapshot).toEqual(fromSchema);
  });

  it('keeps the column defaults of study_cards', () => {
    const snapshot = snapshotSchema.parse(readJson(snapshotPath(0)));
    const columns = snapshot.tables['study_cards']?.columns ?? {};

    expect(columns['ease']?.default).toBe(2.5);
    expect(columns['interval_days']?.default).toBe(0);
    expect(columns['reps']?.default).toBe(0);
    expect(columns['lapses']?.default).toBe(0);
  });
});
