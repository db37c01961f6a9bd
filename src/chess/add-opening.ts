/**
 * Adds a line to the catalog after replaying it on a board, so only legal
 * move sequences are ever stored.
 */

import { tokenizeMoves } from '@/core/moves';
import { EmptyLineError } from '@/core/errors';
import type { OpeningLine } from '@/core/models';
import type { OpeningRepository } from '@/storage/repositories';
import { playLine } from './board';

/**
 * @throws EmptyLineError if `moves` has no tokens
 * @throws IllegalTokenError at the first illegal move
 * @throws DuplicateNameError if the name is taken
 */
export async function addOpening(
  openings: OpeningRepository,
  name: string,
  moves: string
): Promise<OpeningLine> {
  const tokens = validateLine(moves);
  return openings.create({ name, tokens });
}

/**
 * Tokenizes and replays `moves` without storing anything.
 *
 * @returns The line's tokens
 */
export function validateLine(moves: string): string[] {
  const tokens = tokenizeMoves(moves);
  if (tokens.length === 0) {
    throw new EmptyLineError();
  }
  playLine(tokens);
  return tokens;
}
