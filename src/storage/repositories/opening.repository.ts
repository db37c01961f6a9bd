/**
 * Opening Repository Implementation
 *
 * Data access for opening lines. Move legality is not checked here; callers
 * validate lines on a board before creating them (see `addOpening`).
 */

import { asc, eq } from 'drizzle-orm';
import { randomUUID } from 'crypto';
import type { AppDatabase } from '../db';
import { openings } from '../schema';
import type { OpeningLine } from '@/core/models';
import { tokenizeMoves } from '@/core/moves';
import { DuplicateNameError, EmptyLineError } from '@/core/errors';
import type { Repository } from './base';
import { contains, startsWith } from './like';

export interface CreateOpeningInput {
  name: string;
  /** Move tokens in play order */
  tokens: readonly string[];
}

function mapToDomain(row: typeof openings.$inferSelect): OpeningLine {
  return {
    id: row.id,
    name: row.name,
    tokens: tokenizeMoves(row.movesSan),
    movesSan: row.movesSan,
    createdAt: row.createdAt,
  };
}

/**
 * Repository for opening lines, ordered by name wherever a list is returned.
 *
 * @example
 * ```typescript
 * const repo = new OpeningRepository(db);
 * const line = await repo.create({ name: 'Scotch Game', tokens: ['e4', 'e5', 'Nf3', 'Nc6', 'd4'] });
 * const scotch = await repo.findByPrefix('Scotch', 50);
 * ```
 */
export class OpeningRepository implements Repository<OpeningLine, CreateOpeningInput> {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<OpeningLine | null> {
    const result = await this.db.select().from(openings).where(eq(openings.id, id)).limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * Exact, case-sensitive name lookup.
   */
  async findByName(name: string): Promise<OpeningLine | null> {
    const result = await this.db.select().from(openings).where(eq(openings.name, name)).limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  async findAll(): Promise<OpeningLine[]> {
    const results = await this.db.select().from(openings).orderBy(asc(openings.name));
    return results.map(mapToDomain);
  }

  /**
   * Lines whose name starts with `prefix`. An empty prefix matches every line.
   */
  async findByPrefix(prefix: string, limit: number): Promise<OpeningLine[]> {
    const results = await this.db
      .select()
      .from(openings)
      .where(startsWith(openings.name, prefix))
      .orderBy(asc(openings.name))
      .limit(limit);
    return results.map(mapToDomain);
  }

  /**
   * Lines whose name contains `query` anywhere.
   */
  async search(query: string, limit: number): Promise<OpeningLine[]> {
    const results = await this.db
      .select()
      .from(openings)
      .where(contains(openings.name, query))
      .orderBy(asc(openings.name))
      .limit(limit);
    return results.map(mapToDomain);
  }

  /**
   * Stores a new line. The name check and insert run in one transaction.
   *
   * @throws EmptyLineError if there are no tokens
   * @throws DuplicateNameError if the name is taken
   */
  async create(input: CreateOpeningInput): Promise<OpeningLine> {
    const name = input.name.trim();
    const tokens = input.tokens.filter((token) => token.trim().length > 0);
    if (tokens.length === 0) {
      throw new EmptyLineError();
    }

    const row = this.db.transaction((tx) => {
      const existing = tx
        .select({ id: openings.id })
        .from(openings)
        .where(eq(openings.name, name))
        .get();
      if (existing) {
        throw new DuplicateNameError(name);
      }

      return tx
        .insert(openings)
        .values({
          id: `op_${randomUUID()}`,
          name,
          movesSan: tokens.join(' '),
          createdAt: new Date(),
        })
        .returning()
        .get();
    });

    if (!row) {
      throw new Error(`Opening '${name}' could not be created`);
    }
    return mapToDomain(row);
  }

  /**
   * Deletes a line together with its card, reviews, notes and evaluations.
   *
   * @throws Error if the line does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(openings)
      .where(eq(openings.id, id))
      .returning({ id: openings.id });

    if (result.length === 0) {
      throw new Error(`Opening with id '${id}' not found`);
    }
  }
}
