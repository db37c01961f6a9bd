/**
 * Swing Detector Types
 */

/**
 * Numeric stand-in for a forced mate. Large enough to dominate any
 * centipawn score while keeping ordinary arithmetic and comparisons valid.
 */
export const MATE_SCORE = 100000;

/** Swing size, in centipawns, at which a swing is flagged critical */
export const DEFAULT_CRITICAL_SWING_CP = 120;

export type Side = 'white' | 'black';

/**
 * A position's evaluation from White's point of view.
 */
export interface PositionScore {
  /** Centipawns, or +/-MATE_SCORE for a forced mate */
  numeric: number;
  /** Human-readable form, e.g. "+0.35" or "M3" */
  display: string;
}

/**
 * The evaluation oracle as seen by the detector. Must report scores from
 * White's point of view whichever side is to move.
 */
export type EvaluateFn<P> = (position: P) => Promise<PositionScore>;

/**
 * Plays one move token on a position and returns the resulting position.
 * Rejects illegal tokens by throwing.
 */
export type ApplyMoveFn<P> = (position: P, token: string) => P;

/**
 * Score change caused by a single ply.
 */
export interface PlyEvaluation {
  /** 0-based ply index */
  plyIndex: number;
  token: string;
  /** Side that played the move; even indices are White */
  side: Side;
  before: PositionScore;
  after: PositionScore;
  /** after.numeric - before.numeric */
  delta: number;
}

/**
 * The ply with the largest absolute score change in a line.
 */
export interface LargestSwing {
  plyIndex: number;
  /** 1-based ply number for display */
  ply: number;
  side: Side;
  token: string;
  /** Display string before the move */
  before: string;
  /** Display string after the move */
  after: string;
  /** Signed change in centipawns */
  delta: number;
  /** True when |delta| reaches the critical threshold */
  critical: boolean;
}

/**
 * Result of scanning a line through the evaluation oracle.
 */
export interface SwingReport {
  /** Evaluation of the starting position */
  startScore: PositionScore;
  /** One entry per evaluated ply, in order */
  plies: PlyEvaluation[];
  /** Evaluation after the last evaluated ply */
  finalScore: PositionScore;
  /** Largest swing seen, or null when no ply was evaluated */
  swing: LargestSwing | null;
  /** False when the scan stopped before the end of the line */
  complete: boolean;
}

export interface AnalyzeLineOptions<P> {
  /** Starting position */
  start: P;
  applyMove: ApplyMoveFn<P>;
  evaluate: EvaluateFn<P>;
  /** Swings of at least this many centipawns are critical */
  criticalThreshold?: number;
}
