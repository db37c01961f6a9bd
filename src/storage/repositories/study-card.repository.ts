/**
 * Study Card Repository Implementation
 *
 * Persists the SM-2 state of each opening. The scheduling arithmetic lives in
 * the core scheduler; this repository only guarantees that reading a state,
 * writing its successor and appending the review log happen atomically.
 *
 * better-sqlite3 transactions are synchronous and serialize on the
 * connection, so two grade submissions for the same line cannot interleave.
 */

import { and, asc, eq, isNull } from 'drizzle-orm';
import { randomUUID } from 'crypto';
import type { AppDatabase } from '../db';
import { openings, studyCards, studyReviews } from '../schema';
import type {
  ReviewLogEntry,
  ReviewMetadata,
  ScheduledOpening,
  SchedulerState,
} from '@/core/models';
import { startsWith } from './like';
import { mapReviewToDomain } from './review-log.repository';

function mapToDomain(row: typeof studyCards.$inferSelect): SchedulerState {
  return {
    ease: row.ease,
    intervalDays: row.intervalDays,
    reps: row.reps,
    lapses: row.lapses,
    dueDate: row.dueDate,
    lastGrade: row.lastGrade,
    lastReviewedAt: row.lastReviewedAt,
  };
}

function toRow(openingId: string, state: SchedulerState, createdAt: Date): typeof studyCards.$inferInsert {
  return {
    openingId,
    ease: state.ease,
    intervalDays: state.intervalDays,
    dueDate: state.dueDate,
    reps: state.reps,
    lapses: state.lapses,
    lastGrade: state.lastGrade,
    lastReviewedAt: state.lastReviewedAt,
    createdAt,
  };
}

export interface ApplyReviewInput {
  openingId: string;
  grade: number;
  /** State to start from when the opening has no card yet */
  initial: SchedulerState;
  /** Timestamp of the review, stored on the card and the log entry */
  now: Date;
  metadata: ReviewMetadata;
}

export interface AppliedReview {
  state: SchedulerState;
  review: ReviewLogEntry;
}

/**
 * Repository for per-opening scheduler state.
 *
 * @example
 * ```typescript
 * const cards = new StudyCardRepository(db);
 * await cards.ensureForPrefix('Scotch', scheduler.createInitialState(today));
 * const scheduled = await cards.findScheduled('Scotch');
 * ```
 */
export class StudyCardRepository {
  constructor(private readonly db: AppDatabase) {}

  async findByOpeningId(openingId: string): Promise<SchedulerState | null> {
    const result = await this.db
      .select()
      .from(studyCards)
      .where(eq(studyCards.openingId, openingId))
      .limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * Returns the opening's card, creating it from `initial` if it has none.
   * Insert-or-ignore and read run in one transaction.
   */
  async getOrCreate(openingId: string, initial: SchedulerState): Promise<SchedulerState> {
    const row = this.db.transaction((tx) => {
      tx.insert(studyCards)
        .values(toRow(openingId, initial, new Date()))
        .onConflictDoNothing()
        .run();
      return tx.select().from(studyCards).where(eq(studyCards.openingId, openingId)).get();
    });

    if (!row) {
      throw new Error(`Study card for opening '${openingId}' could not be created`);
    }
    return mapToDomain(row);
  }

  /**
   * Creates cards for every opening under `prefix` that has none.
   *
   * @returns How many cards were created
   */
  async ensureForPrefix(prefix: string, initial: SchedulerState): Promise<number> {
    return this.db.transaction((tx) => {
      const missing = tx
        .select({ id: openings.id })
        .from(openings)
        .leftJoin(studyCards, eq(studyCards.openingId, openings.id))
        .where(and(isNull(studyCards.openingId), startsWith(openings.name, prefix)))
        .all();

      if (missing.length === 0) {
        return 0;
      }

      const createdAt = new Date();
      tx.insert(studyCards)
        .values(missing.map((opening) => toRow(opening.id, initial, createdAt)))
        .run();
      return missing.length;
    });
  }

  /**
   * Every opening under `prefix` that has a card, ordered by due date then
   * name.
   */
  async findScheduled(prefix: string): Promise<ScheduledOpening[]> {
    const rows = await this.db
      .select({
        id: openings.id,
        name: openings.name,
        movesSan: openings.movesSan,
        dueDate: studyCards.dueDate,
      })
      .from(studyCards)
      .innerJoin(openings, eq(openings.id, studyCards.openingId))
      .where(startsWith(openings.name, prefix))
      .orderBy(asc(studyCards.dueDate), asc(openings.name));
    return rows;
  }

  /**
   * Atomically reads the card (creating it if missing), computes the next
   * state with `update`, writes it, and appends the review log entry.
   *
   * If `update` throws, nothing is written.
   */
  async applyReview(
    input: ApplyReviewInput,
    update: (current: SchedulerState) => SchedulerState
  ): Promise<AppliedReview> {
    return this.db.transaction((tx) => {
      tx.insert(studyCards)
        .values(toRow(input.openingId, input.initial, input.now))
        .onConflictDoNothing()
        .run();

      const currentRow = tx
        .select()
        .from(studyCards)
        .where(eq(studyCards.openingId, input.openingId))
        .get();
      if (!currentRow) {
        throw new Error(`Study card for opening '${input.openingId}' not found`);
      }

      const next = update(mapToDomain(currentRow));

      const stateRow = tx
        .update(studyCards)
        .set({
          ease: next.ease,
          intervalDays: next.intervalDays,
          dueDate: next.dueDate,
          reps: next.reps,
          lapses: next.lapses,
          lastGrade: next.lastGrade,
          lastReviewedAt: next.lastReviewedAt,
        })
        .where(eq(studyCards.openingId, input.openingId))
        .returning()
        .get();
      if (!stateRow) {
        throw new Error(`Study card for opening '${input.openingId}' could not be updated`);
      }

      const reviewRow = tx
        .insert(studyReviews)
        .values({
          id: `rev_${randomUUID()}`,
          openingId: input.openingId,
          reviewedAt: input.now,
          grade: input.grade,
          promptMode: input.metadata.promptMode,
          prompt: input.metadata.prompt ?? null,
          typedMoves: input.metadata.typedMoves ?? null,
          correctTokens: input.metadata.correctTokens ?? null,
          targetTokens: input.metadata.targetTokens ?? null,
        })
        .returning()
        .get();
      if (!reviewRow) {
        throw new Error(`Review for opening '${input.openingId}' could not be logged`);
      }

      return { state: mapToDomain(stateRow), review: mapReviewToDomain(reviewRow) };
    });
  }
}
