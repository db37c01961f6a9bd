/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema for SQLite. The migration in ./drizzle is generated
 * from this file with `npm run db:generate`.
 *
 * Tables:
 * - openings: named move sequences
 * - study_cards: SM-2 state, one row per opening, created lazily
 * - study_reviews: append-only log of graded reviews
 * - opening_notes: free-form notes per opening
 * - evaluations: engine evaluations of an opening's final position
 *
 * Timestamps are milliseconds since epoch. Due dates are calendar dates
 * stored as 'YYYY-MM-DD' text, so they compare correctly as strings.
 * Every child table cascades on opening deletion.
 */

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

export const openings = sqliteTable('openings', {
  // Prefixed UUID, e.g. 'op_1f0c...'
  id: text('id').primaryKey(),

  name: text('name').notNull().unique(),

  // SAN tokens joined by single spaces, validated before insert
  movesSan: text('moves_san').notNull(),

  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Study Cards Table
 *
 * Invariant: due_date = (calendar date of the last update) + interval_days.
 */
export const studyCards = sqliteTable(
  'study_cards',
  {
    openingId: text('opening_id')
      .primaryKey()
      .references(() => openings.id, { onDelete: 'cascade' }),

    // SM-2 ease factor, kept within [1.3, 3.0]
    ease: real('ease').notNull().default(2.5),

    intervalDays: integer('interval_days').notNull().default(0),

    // 'YYYY-MM-DD'
    dueDate: text('due_date').notNull(),

    reps: integer('reps').notNull().default(0),

    lapses: integer('lapses').notNull().default(0),

    lastGrade: integer('last_grade'),

    lastReviewedAt: integer('last_reviewed_at', { mode: 'timestamp_ms' }),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('study_cards_due_date_idx').on(table.dueDate)]
);

export const studyReviews = sqliteTable(
  'study_reviews',
  {
    id: text('id').primaryKey(),

    openingId: text('opening_id')
      .notNull()
      .references(() => openings.id, { onDelete: 'cascade' }),

    reviewedAt: integer('reviewed_at', { mode: 'timestamp_ms' }).notNull(),

    // 0..5
    grade: integer('grade').notNull(),

    promptMode: text('prompt_mode', { enum: ['name_to_moves', 'manual'] }).notNull(),

    prompt: text('prompt'),

    typedMoves: text('typed_moves'),

    correctTokens: integer('correct_tokens'),

    targetTokens: integer('target_tokens'),
  },
  (table) => [index('study_reviews_opening_id_idx').on(table.openingId)]
);

export const openingNotes = sqliteTable('opening_notes', {
  openingId: text('opening_id')
    .primaryKey()
    .references(() => openings.id, { onDelete: 'cascade' }),

  notes: text('notes').notNull(),

  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Evaluations Table
 *
 * Scores are from the point of view of the side to move in the evaluated
 * position. Exactly one of score_cp and mate_in is set when the engine
 * reported a score.
 */
export const evaluations = sqliteTable(
  'evaluations',
  {
    id: text('id').primaryKey(),

    openingId: text('opening_id')
      .notNull()
      .references(() => openings.id, { onDelete: 'cascade' }),

    depth: integer('depth').notNull(),

    scoreCp: integer('score_cp'),

    mateIn: integer('mate_in'),

    bestmoveUci: text('bestmove_uci'),

    // Principal variation, space-separated UCI moves
    pvUci: text('pv_uci'),

    analyzedAt: integer('analyzed_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('evaluations_opening_id_idx').on(table.openingId)]
);

export type Opening = typeof openings.$inferSelect;
export type NewOpening = typeof openings.$inferInsert;
export type StudyCard = typeof studyCards.$inferSelect;
export type NewStudyCard = typeof studyCards.$inferInsert;
export type StudyReview = typeof studyReviews.$inferSelect;
export type NewStudyReview = typeof studyReviews.$inferInsert;
export type OpeningNote = typeof openingNotes.$inferSelect;
export type Evaluation = typeof evaluations.$inferSelect;
export type NewEvaluation = typeof evaluations.$inferInsert;
