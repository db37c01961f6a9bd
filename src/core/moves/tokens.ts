/**
 * Move Token Utilities
 *
 * Helpers shared by the quiz checker, the tree builder and the study sheet.
 * A move token is an opaque string; nothing here knows chess rules.
 */

/** Matches standalone move numbers such as "12." or "12..." */
const MOVE_NUMBER_PATTERN = /^\d+\.(\.\.)?$/;

/** PGN game termination markers */
const RESULT_TOKENS = new Set(['1-0', '0-1', '1/2-1/2', '*']);

/**
 * Splits move text on whitespace, dropping empty tokens.
 *
 * @example
 * tokenizeMoves('e4  e5\nNf3'); // ['e4', 'e5', 'Nf3']
 */
export function tokenizeMoves(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Length of the common prefix of two sequences, compared position by
 * position and stopping at the first mismatch.
 */
export function commonPrefixLength(a: readonly string[], b: readonly string[]): number {
  const limit = Math.min(a.length, b.length);
  let i = 0;
  while (i < limit && a[i] === b[i]) {
    i++;
  }
  return i;
}

/**
 * Longest prefix shared by every sequence.
 *
 * Returns an empty array for an empty input or when the sequences already
 * differ at position 0.
 *
 * @example
 * longestCommonPrefix([['e4', 'e5', 'Nf3'], ['e4', 'e5', 'Nc3']]); // ['e4', 'e5']
 */
export function longestCommonPrefix(sequences: readonly (readonly string[])[]): string[] {
  if (sequences.length === 0) {
    return [];
  }

  const [first, ...rest] = sequences;
  const shortest = Math.min(...sequences.map((seq) => seq.length));
  const prefix: string[] = [];

  for (let i = 0; i < shortest; i++) {
    const token = first[i];
    if (!rest.every((seq) => seq[i] === token)) {
      break;
    }
    prefix.push(token);
  }

  return prefix;
}

/**
 * Groups tokens into space-joined chunks of `size` for rehearsal.
 *
 * @throws RangeError if size is not a positive integer
 */
export function chunkTokens(tokens: readonly string[], size: number): string[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: string[] = [];
  for (let i = 0; i < tokens.length; i += size) {
    chunks.push(tokens.slice(i, i + size).join(' '));
  }
  return chunks;
}

/**
 * Strips move numbers and result markers from PGN movetext, leaving the
 * SAN tokens joined by single spaces.
 *
 * @example
 * sanitizePgnMoves('1. e4 e5 2. Nf3 Nc6 *'); // 'e4 e5 Nf3 Nc6'
 */
export function sanitizePgnMoves(pgn: string): string {
  return tokenizeMoves(pgn)
    .filter((token) => !MOVE_NUMBER_PATTERN.test(token) && !RESULT_TOKENS.has(token))
    .join(' ');
}
