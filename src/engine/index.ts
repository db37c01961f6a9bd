/**
 * Engine Module - Barrel Export
 *
 * UCI client for Stockfish plus the adapters used by evaluation commands
 * and the swing detector.
 */

export { EngineError, EngineNotFoundError } from './errors';
export { resolveStockfishPath } from './resolve-path';
export { spawnTransport, type EngineTransport } from './transport';
export { UciEngine, type UciEngineOptions } from './uci-engine';
export {
  parseInfoLine,
  parseBestMove,
  formatCentipawns,
  formatStoredScore,
  toWhitePov,
  type UciScore,
  type UciInfo,
  type EngineAnalysis,
} from './uci';
export { toEvaluationResult, evaluatePosition, createWhitePovEvaluator } from './evaluator';
export {
  EngineSession,
  type EngineLauncher,
  type PositionEvaluator,
} from './engine-session';
