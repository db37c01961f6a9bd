/**
 * API Types
 *
 * Response envelopes shared by every endpoint and the zod schemas for
 * request bodies and query strings.
 *
 * @example
 * ```typescript
 * const ok: ApiResponse<OpeningLine[]> = { success: true, data: lines };
 * const failed: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'DUPLICATE_NAME', message: "An opening named 'Scotch' already exists." },
 * };
 * ```
 */

import { z } from 'zod';

// ============================================================================
// Response Envelopes
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR' or 'ILLEGAL_MOVE' */
  code: string;
  message: string;
  /** Field-level issues for validation errors, extra context otherwise */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

/**
 * POST /api/openings. Moves are SAN tokens separated by whitespace, and are
 * replayed on a board before anything is stored.
 */
export const createOpeningSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Name is required')
    .max(200, 'Name must be 200 characters or less'),
  moves: z.string().min(1, 'Moves are required'),
});

export type CreateOpeningBody = z.infer<typeof createOpeningSchema>;

export const updateNotesSchema = z.object({
  notes: z.string().max(10_000, 'Notes must be 10000 characters or less'),
});

export type UpdateNotesBody = z.infer<typeof updateNotesSchema>;

/**
 * POST /api/openings/:id/quiz. `tokens` is how many leading moves are asked
 * for.
 */
export const quizSchema = z.object({
  typed: z.string(),
  tokens: z.number().int().min(1, 'Prompt length must be at least 1').default(10),
});

export type QuizBody = z.infer<typeof quizSchema>;

/**
 * POST /api/openings/:id/reviews. The grade is range-checked by the
 * scheduler, which answers INVALID_GRADE for anything but an integer 0..5.
 */
export const reviewSchema = z.object({
  grade: z.number(),
  promptMode: z.enum(['name_to_moves', 'manual']).default('manual'),
  prompt: z.string().nullable().optional(),
  typedMoves: z.string().nullable().optional(),
  correctTokens: z.number().int().min(0).nullable().optional(),
  targetTokens: z.number().int().min(0).nullable().optional(),
});

export type ReviewBody = z.infer<typeof reviewSchema>;

export const evalSchema = z.object({
  fen: z.string().min(1, 'FEN is required'),
});

export type EvalBody = z.infer<typeof evalSchema>;

// ============================================================================
// Query Schemas
// ============================================================================

export const listOpeningsQuerySchema = z.object({
  prefix: z.string().optional(),
  q: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(200),
});

export const dueQuerySchema = z.object({
  prefix: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

export const treeQuerySchema = z.object({
  prefix: z.string().optional(),
  levels: z.coerce.number().int().min(1).max(20).default(3),
  limit: z.coerce.number().int().min(1).max(5000).default(200),
});

export const evalQuerySchema = z.object({
  depth: z.coerce.number().int().min(1).max(99).optional(),
});
