/**
 * Evaluation Domain Types
 */

/**
 * One engine analysis of a position at a fixed depth.
 *
 * Scores are from the point of view of the side to move. When the engine
 * sees a forced mate, `mateIn` is set (negative when the side to move is
 * being mated) and `scoreCp` is null.
 */
export interface EvaluationResult {
  depth: number;
  scoreCp: number | null;
  mateIn: number | null;
  bestmoveUci: string | null;
  /** Principal variation as space-separated UCI moves */
  pvUci: string | null;
}

/**
 * An evaluation stored against an opening's final position.
 */
export interface StoredEvaluation extends EvaluationResult {
  id: string;
  openingId: string;
  analyzedAt: Date;
}
