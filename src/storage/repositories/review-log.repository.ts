/**
 * Review Log Repository Implementation
 *
 * Read access to the append-only review log. Entries are written only by
 * StudyCardRepository.applyReview, in the same transaction as the state.
 */

import { asc, count, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { studyReviews } from '../schema';
import type { ReviewLogEntry } from '@/core/models';

export function mapReviewToDomain(row: typeof studyReviews.$inferSelect): ReviewLogEntry {
  return {
    id: row.id,
    openingId: row.openingId,
    reviewedAt: row.reviewedAt,
    grade: row.grade,
    promptMode: row.promptMode,
    prompt: row.prompt,
    typedMoves: row.typedMoves,
    correctTokens: row.correctTokens,
    targetTokens: row.targetTokens,
  };
}

export class ReviewLogRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Reviews of one opening, oldest first.
   */
  async findByOpeningId(openingId: string): Promise<ReviewLogEntry[]> {
    const rows = await this.db
      .select()
      .from(studyReviews)
      .where(eq(studyReviews.openingId, openingId))
      .orderBy(asc(studyReviews.reviewedAt));
    return rows.map(mapReviewToDomain);
  }

  async countByOpeningId(openingId: string): Promise<number> {
    const result = await this.db
      .select({ total: count() })
      .from(studyReviews)
      .where(eq(studyReviews.openingId, openingId));
    return result[0]?.total ?? 0;
  }
}
