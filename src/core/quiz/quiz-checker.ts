/**
 * Quiz Checker
 *
 * Scores a typed recall attempt against the opening's first N moves.
 *
 * Scoring is strict prefix matching: tokens are compared position by
 * position and counting stops at the first mismatch. A wrong early move
 * therefore earns no credit for later moves, even ones that happen to match.
 */

import { EmptyTargetError } from '../errors';
import { commonPrefixLength, tokenizeMoves } from '../moves';

/**
 * Outcome of one recall attempt. Not persisted; the review log stores the
 * counts.
 */
export interface QuizResult {
  /** The tokens the user was asked to recall */
  target: string[];
  /** The whitespace-split tokens the user typed */
  typed: string[];
  /** Number of leading typed tokens that match the target */
  correctTokens: number;
  /** Equal to target.length */
  targetTokens: number;
  /** True when every target token was recalled in order */
  fullyCorrect: boolean;
}

/**
 * Checks a typed attempt against the first `promptLength` tokens of a line.
 *
 * Extra typed tokens beyond the target are ignored.
 *
 * @param tokens - The line's move tokens
 * @param typedText - Raw text typed by the user
 * @param promptLength - How many leading tokens are asked for
 * @throws EmptyTargetError if the target would be empty
 *
 * @example
 * checkRecall(['e4', 'e5', 'Nf3'], 'e4 e6', 3);
 * // { correctTokens: 1, targetTokens: 3, fullyCorrect: false, ... }
 */
export function checkRecall(
  tokens: readonly string[],
  typedText: string,
  promptLength: number
): QuizResult {
  if (tokens.length === 0) {
    throw new EmptyTargetError('Opening has no move tokens to quiz');
  }
  if (!Number.isInteger(promptLength) || promptLength < 1) {
    throw new EmptyTargetError(`Prompt length must be an integer of at least 1, got ${promptLength}`);
  }

  const target = tokens.slice(0, promptLength);
  const typed = tokenizeMoves(typedText);
  const correctTokens = commonPrefixLength(typed, target);

  return {
    target,
    typed,
    correctTokens,
    targetTokens: target.length,
    fullyCorrect: correctTokens === target.length,
  };
}

/**
 * Suggests a 0-5 grade from the share of the target recalled. The user
 * confirms or overrides it in the quiz flow.
 *
 * - all tokens: 5
 * - at least three quarters: 4
 * - at least half: 3
 * - at least a quarter: 2
 * - some: 1
 * - none: 0
 */
export function suggestGrade(result: Pick<QuizResult, 'correctTokens' | 'targetTokens'>): number {
  if (result.targetTokens === 0) {
    return 0;
  }
  if (result.correctTokens >= result.targetTokens) {
    return 5;
  }

  const ratio = result.correctTokens / result.targetTokens;
  if (ratio >= 0.75) return 4;
  if (ratio >= 0.5) return 3;
  if (ratio >= 0.25) return 2;
  if (ratio > 0) return 1;
  return 0;
}
