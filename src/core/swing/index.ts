/**
 * Swing Module - Barrel Export
 *
 * Finds the ply with the largest evaluation change in an opening line.
 */

export { analyzeLine, sideForPly } from './swing-detector';
export {
  MATE_SCORE,
  DEFAULT_CRITICAL_SWING_CP,
  type Side,
  type PositionScore,
  type EvaluateFn,
  type ApplyMoveFn,
  type PlyEvaluation,
  type LargestSwing,
  type SwingReport,
  type AnalyzeLineOptions,
} from './types';
