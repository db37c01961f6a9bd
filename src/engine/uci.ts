/**
 * UCI Protocol Parsing
 *
 * Pure helpers for the engine's text protocol: parsing `info` and `bestmove`
 * lines, and turning side-to-move scores into White's point of view.
 *
 * @example
 * parseInfoLine('info depth 12 score cp 31 pv e2e4 e7e5');
 * // { depth: 12, multipv: null, score: { kind: 'cp', value: 31 }, pv: ['e2e4', 'e7e5'] }
 */

import { MATE_SCORE, type PositionScore, type Side } from '@/core/swing';

/**
 * A score as the engine reports it: from the side to move. For mates,
 * `value` is the number of moves to mate, negative when the side to move is
 * getting mated.
 */
export interface UciScore {
  kind: 'cp' | 'mate';
  value: number;
}

export interface UciInfo {
  depth: number | null;
  multipv: number | null;
  score: UciScore | null;
  /** Principal variation in UCI notation */
  pv: string[];
}

/**
 * Everything one search produced, normalized.
 */
export interface EngineAnalysis {
  /** Requested search depth */
  depth: number;
  score: UciScore | null;
  bestmove: string | null;
  pv: string[];
}

function parseInteger(value: string | undefined): number | null {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

/**
 * Parses an `info` line. Returns null for any other line, and for info
 * lines that carry neither a score nor a principal variation (such as
 * `info string ...` or `currmove` updates).
 */
export function parseInfoLine(line: string): UciInfo | null {
  const fields = line.trim().split(/\s+/);
  if (fields[0] !== 'info') {
    return null;
  }

  const info: UciInfo = { depth: null, multipv: null, score: null, pv: [] };

  for (let i = 1; i < fields.length; i++) {
    switch (fields[i]) {
      case 'string':
        // The rest of the line is free text
        return null;
      case 'depth':
        info.depth = parseInteger(fields[++i]);
        break;
      case 'multipv':
        info.multipv = parseInteger(fields[++i]);
        break;
      case 'score': {
        const kind = fields[i + 1];
        const value = parseInteger(fields[i + 2]);
        if ((kind === 'cp' || kind === 'mate') && value !== null) {
          info.score = { kind, value };
        }
        i += 2;
        // lowerbound/upperbound qualifiers follow the value
        while (fields[i + 1] === 'lowerbound' || fields[i + 1] === 'upperbound') {
          i++;
        }
        break;
      }
      case 'pv':
        // pv is always the last field
        info.pv = fields.slice(i + 1);
        i = fields.length;
        break;
      default:
        break;
    }
  }

  return info.score === null && info.pv.length === 0 ? null : info;
}

/**
 * Parses a `bestmove` line. `move` is null when the engine has no move
 * (`bestmove (none)` in a mate or stalemate position). Returns null for any
 * other line.
 */
export function parseBestMove(line: string): { move: string | null } | null {
  const fields = line.trim().split(/\s+/);
  if (fields[0] !== 'bestmove') {
    return null;
  }
  const move = fields[1];
  return { move: move === undefined || move === '(none)' ? null : move };
}

/**
 * Signed pawn value, always with a sign: 31 -> "+0.31".
 */
export function formatCentipawns(cp: number): string {
  const sign = cp < 0 ? '-' : '+';
  return `${sign}${(Math.abs(cp) / 100).toFixed(2)}`;
}

/**
 * Display form for a stored evaluation: "M3", "0.31", or "?" when the
 * engine gave no score.
 */
export function formatStoredScore(scoreCp: number | null, mateIn: number | null): string {
  if (mateIn !== null) {
    return `M${mateIn}`;
  }
  if (scoreCp === null) {
    return '?';
  }
  return (scoreCp / 100).toFixed(2);
}

/**
 * Converts a side-to-move score into White's point of view. A mate maps to
 * +/-MATE_SCORE; a missing score counts as level with display "?".
 */
export function toWhitePov(score: UciScore | null, sideToMove: Side): PositionScore {
  if (score === null) {
    return { numeric: 0, display: '?' };
  }

  const sign = sideToMove === 'white' ? 1 : -1;

  if (score.kind === 'mate') {
    // mate 0: the side to move is already mated
    const moverWins = score.value > 0;
    const numeric = (moverWins ? MATE_SCORE : -MATE_SCORE) * sign;
    const whiteMate = score.value * sign;
    return { numeric, display: `M${whiteMate === 0 ? 0 : whiteMate}` };
  }

  // Avoid -0 for a level position with Black to move
  const cp = score.value === 0 ? 0 : score.value * sign;
  return { numeric: cp, display: formatCentipawns(cp) };
}
