/**
 * Swing Detector
 *
 * Walks a line through the evaluation oracle one ply at a time and finds
 * the move that changed the evaluation the most. That move is usually the
 * one worth memorizing hardest: a natural-looking alternative there loses.
 *
 * Plies are evaluated strictly in sequence because each position depends on
 * the previous move. There is no cancellation point inside a scan; callers
 * batching several lines can stop between lines.
 */

import { OracleUnavailableError } from '../errors';
import {
  DEFAULT_CRITICAL_SWING_CP,
  type AnalyzeLineOptions,
  type LargestSwing,
  type PlyEvaluation,
  type PositionScore,
  type Side,
  type SwingReport,
} from './types';

/** Side that plays the ply at a 0-based index */
export function sideForPly(plyIndex: number): Side {
  return plyIndex % 2 === 0 ? 'white' : 'black';
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function buildReport(
  startScore: PositionScore,
  plies: PlyEvaluation[],
  criticalThreshold: number,
  complete: boolean
): SwingReport {
  let best: PlyEvaluation | null = null;
  for (const ply of plies) {
    // Strict comparison: the earliest ply wins ties
    if (best === null || Math.abs(ply.delta) > Math.abs(best.delta)) {
      best = ply;
    }
  }

  const swing: LargestSwing | null = best === null ? null : {
    plyIndex: best.plyIndex,
    ply: best.plyIndex + 1,
    side: best.side,
    token: best.token,
    before: best.before.display,
    after: best.after.display,
    delta: best.delta,
    critical: Math.abs(best.delta) >= criticalThreshold,
  };

  return {
    startScore,
    plies,
    finalScore: plies.length > 0 ? plies[plies.length - 1].after : startScore,
    swing,
    complete,
  };
}

/**
 * Evaluates the start position and every ply of a line, returning the
 * per-ply deltas and the largest swing.
 *
 * @throws OracleUnavailableError when an evaluation fails; `partial` carries
 *   the report for the plies evaluated before the failure (null if the
 *   start position could not be evaluated). Not retried here.
 * @throws whatever `applyMove` throws (IllegalTokenError), unchanged
 *
 * @example
 * ```typescript
 * const report = await analyzeLine(['e4', 'e5', 'Qh5'], {
 *   start: startPosition(),
 *   applyMove,
 *   evaluate: createWhitePovEvaluator(engine, 10),
 * });
 * report.swing?.ply; // 1-based ply of the biggest change
 * ```
 */
export async function analyzeLine<P>(
  tokens: readonly string[],
  options: AnalyzeLineOptions<P>
): Promise<SwingReport> {
  const criticalThreshold = options.criticalThreshold ?? DEFAULT_CRITICAL_SWING_CP;

  let startScore: PositionScore;
  try {
    startScore = await options.evaluate(options.start);
  } catch (error) {
    throw new OracleUnavailableError(
      `Evaluation of the start position failed: ${describeFailure(error)}`,
      null,
      { cause: error }
    );
  }

  const plies: PlyEvaluation[] = [];
  let position = options.start;
  let previous = startScore;

  for (let plyIndex = 0; plyIndex < tokens.length; plyIndex++) {
    const token = tokens[plyIndex];
    position = options.applyMove(position, token);

    let current: PositionScore;
    try {
      current = await options.evaluate(position);
    } catch (error) {
      throw new OracleUnavailableError(
        `Evaluation failed at ply ${plyIndex + 1} (${token}): ${describeFailure(error)}`,
        buildReport(startScore, plies, criticalThreshold, false),
        { cause: error }
      );
    }

    plies.push({
      plyIndex,
      token,
      side: sideForPly(plyIndex),
      before: previous,
      after: current,
      delta: current.numeric - previous.numeric,
    });
    previous = current;
  }

  return buildReport(startScore, plies, criticalThreshold, true);
}
