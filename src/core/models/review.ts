/**
 * Review Log Domain Types
 *
 * Every applied grade appends exactly one ReviewLogEntry. Entries are never
 * edited or removed; they are the history used for progress reporting.
 */

/**
 * How the line was prompted during the review.
 *
 * 'name_to_moves' is the quiz flow (the name is shown, the moves are typed).
 * 'manual' is a grade submitted without a typed attempt.
 */
export type PromptMode = 'name_to_moves' | 'manual';

/**
 * A single entry in the append-only review log.
 */
export interface ReviewLogEntry {
  id: string;
  openingId: string;
  reviewedAt: Date;
  grade: number;
  promptMode: PromptMode;
  prompt: string | null;
  typedMoves: string | null;
  correctTokens: number | null;
  targetTokens: number | null;
}

/**
 * Metadata recorded alongside a grade. All fields except the prompt mode are
 * optional; a manual grade has no typed attempt.
 */
export interface ReviewMetadata {
  promptMode: PromptMode;
  prompt?: string | null;
  typedMoves?: string | null;
  correctTokens?: number | null;
  targetTokens?: number | null;
}
