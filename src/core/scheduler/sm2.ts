/**
 * SM-2 Update Rule
 *
 * The pure arithmetic of the SuperMemo-2 family: given the current ease,
 * interval and counters plus a 0-5 grade, produce the next values. Dates
 * and persistence are handled by RecallScheduler.
 */

import { InvalidGradeError } from '../errors';
import type { RecallGrade } from '../models';

/** Grades below this are lapses */
export const PASSING_GRADE = 3;

/**
 * Tunables for the SM-2 curve. The defaults are the classic SM-2 values
 * with the ease capped at 3.0.
 */
export interface Sm2Parameters {
  /** Lower clamp for the ease factor */
  minimumEase: number;
  /** Upper clamp for the ease factor */
  maximumEase: number;
  /** Interval after the first successful review */
  firstInterval: number;
  /** Interval after the second successful review */
  secondInterval: number;
}

export const DEFAULT_SM2_PARAMETERS: Sm2Parameters = {
  minimumEase: 1.3,
  maximumEase: 3.0,
  firstInterval: 1,
  secondInterval: 6,
};

export interface Sm2Values {
  ease: number;
  intervalDays: number;
  reps: number;
  lapses: number;
}

/**
 * Narrows an arbitrary value to a RecallGrade.
 *
 * @throws InvalidGradeError for anything but the integers 0..5
 */
export function assertGrade(grade: unknown): asserts grade is RecallGrade {
  if (typeof grade !== 'number' || !Number.isInteger(grade) || grade < 0 || grade > 5) {
    throw new InvalidGradeError(grade);
  }
}

function clamp(min: number, value: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * Applies one grade to the SM-2 values.
 *
 * The ease is adjusted for every grade, lapses included, so a lapse keeps
 * its ease penalty while its interval and reps reset.
 */
export function sm2Update(
  current: Sm2Values,
  grade: number,
  params: Sm2Parameters = DEFAULT_SM2_PARAMETERS
): Sm2Values {
  assertGrade(grade);

  const miss = 5 - grade;
  const ease = clamp(
    params.minimumEase,
    current.ease + (0.1 - miss * (0.08 + miss * 0.02)),
    params.maximumEase
  );

  if (grade < PASSING_GRADE) {
    return { ease, intervalDays: 1, reps: 0, lapses: current.lapses + 1 };
  }

  const reps = current.reps + 1;
  let intervalDays: number;
  if (reps === 1) {
    intervalDays = params.firstInterval;
  } else if (reps === 2) {
    intervalDays = params.secondInterval;
  } else {
    intervalDays = Math.max(1, Math.round(current.intervalDays * ease));
  }

  return { ease, intervalDays, reps, lapses: current.lapses };
}
