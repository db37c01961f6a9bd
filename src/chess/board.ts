/**
 * Board Helpers
 *
 * Move application over chess.js. Positions are FEN strings, so each step
 * produces a new immutable position and lines can be replayed from any
 * point.
 */

import { Chess } from 'chess.js';
import { IllegalTokenError } from '@/core/errors';
import type { Side } from '@/core/swing';

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

export function startPosition(): string {
  return START_FEN;
}

/**
 * 1-based ply of the next move in a FEN position.
 */
export function nextPly(fen: string): number {
  const [, turn, , , , fullmove] = fen.split(' ');
  const moveNumber = Number.parseInt(fullmove ?? '1', 10);
  return (Number.isNaN(moveNumber) ? 0 : (moveNumber - 1) * 2) + (turn === 'b' ? 2 : 1);
}

export function sideToMove(fen: string): Side {
  return new Chess(fen).turn() === 'w' ? 'white' : 'black';
}

/**
 * Plays one SAN token.
 *
 * @throws IllegalTokenError if the token is not a legal move in `fen`
 */
export function applyMove(fen: string, token: string): string {
  const chess = new Chess(fen);
  try {
    chess.move(token);
  } catch (error) {
    throw new IllegalTokenError(token, nextPly(fen), { cause: error });
  }
  return chess.fen();
}

export interface PlayedLine {
  /** Position after the last move */
  fen: string;
  /** Position before each move, then the final position */
  positions: string[];
}

/**
 * Replays a line from the starting position.
 *
 * @throws IllegalTokenError at the first illegal token
 */
export function playLine(tokens: readonly string[], start: string = START_FEN): PlayedLine {
  const positions = [start];
  let fen = start;
  for (const token of tokens) {
    fen = applyMove(fen, token);
    positions.push(fen);
  }
  return { fen, positions };
}

/**
 * Normalized FEN, or null when chess.js rejects it.
 */
export function parseFen(fen: string): string | null {
  try {
    return new Chess(fen.trim()).fen();
  } catch {
    return null;
  }
}
