/**
 * Position Evaluation
 *
 * Adapts engine searches to the two shapes the app consumes: stored
 * evaluations (side-to-move scores) and the swing detector's White-POV
 * scores.
 */

import { sideToMove } from '@/chess';
import type { EvaluationResult } from '@/core/models';
import type { EvaluateFn } from '@/core/swing';
import type { UciEngine } from './uci-engine';
import { toWhitePov, type EngineAnalysis } from './uci';

/**
 * Converts one search into the stored-evaluation shape. The score stays
 * from the point of view of the side to move.
 */
export function toEvaluationResult(analysis: EngineAnalysis): EvaluationResult {
  const score = analysis.score;
  return {
    depth: analysis.depth,
    scoreCp: score?.kind === 'cp' ? score.value : null,
    mateIn: score?.kind === 'mate' ? score.value : null,
    bestmoveUci: analysis.bestmove,
    pvUci: analysis.pv.length > 0 ? analysis.pv.join(' ') : null,
  };
}

export async function evaluatePosition(
  engine: UciEngine,
  fen: string,
  depth: number
): Promise<EvaluationResult> {
  return toEvaluationResult(await engine.analyse(fen, depth));
}

/**
 * An evaluate function for `analyzeLine` over FEN positions, reporting
 * scores from White's point of view.
 */
export function createWhitePovEvaluator(engine: UciEngine, depth: number): EvaluateFn<string> {
  return async (fen) => {
    const analysis = await engine.analyse(fen, depth);
    return toWhitePov(analysis.score, sideToMove(fen));
  };
}
