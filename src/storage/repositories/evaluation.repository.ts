/**
 * Evaluation Repository Implementation
 *
 * Engine evaluations of each opening's final position. Older evaluations are
 * kept; `latest` returns the most recent.
 */

import { desc, eq, sql } from 'drizzle-orm';
import { randomUUID } from 'crypto';
import type { AppDatabase } from '../db';
import { evaluations } from '../schema';
import type { EvaluationResult, StoredEvaluation } from '@/core/models';

function mapToDomain(row: typeof evaluations.$inferSelect): StoredEvaluation {
  return {
    id: row.id,
    openingId: row.openingId,
    depth: row.depth,
    scoreCp: row.scoreCp,
    mateIn: row.mateIn,
    bestmoveUci: row.bestmoveUci,
    pvUci: row.pvUci,
    analyzedAt: row.analyzedAt,
  };
}

export class EvaluationRepository {
  constructor(private readonly db: AppDatabase) {}

  async store(
    openingId: string,
    result: EvaluationResult,
    analyzedAt: Date = new Date()
  ): Promise<StoredEvaluation> {
    const rows = await this.db
      .insert(evaluations)
      .values({
        id: `ev_${randomUUID()}`,
        openingId,
        depth: result.depth,
        scoreCp: result.scoreCp,
        mateIn: result.mateIn,
        bestmoveUci: result.bestmoveUci,
        pvUci: result.pvUci,
        analyzedAt,
      })
      .returning();
    return mapToDomain(rows[0]);
  }

  /**
   * Most recent evaluation; insertion order breaks timestamp ties.
   */
  async latest(openingId: string): Promise<StoredEvaluation | null> {
    const rows = await this.db
      .select()
      .from(evaluations)
      .where(eq(evaluations.openingId, openingId))
      .orderBy(desc(evaluations.analyzedAt), sql`rowid DESC`)
      .limit(1);
    return rows.length === 0 ? null : mapToDomain(rows[0]);
  }
}
