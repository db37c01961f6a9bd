/**
 * Recall Scheduler - SM-2 Spaced Repetition
 *
 * Wraps the SM-2 update rule with the calendar side of scheduling: creating
 * fresh states, stamping due dates and checking whether a line is due.
 *
 * The scheduler never reads the clock. `today` (a calendar date) and `now`
 * (the review timestamp) are always passed in, which keeps it deterministic
 * under test and lets the caller decide which timezone "today" lives in.
 */

import { addDays } from '../calendar';
import type { CalendarDate, SchedulerState } from '../models';
import { DEFAULT_SM2_PARAMETERS, sm2Update, type Sm2Parameters } from './sm2';

/**
 * Configuration options for the RecallScheduler.
 */
export interface RecallSchedulerConfig extends Sm2Parameters {
  /** Ease given to a line the first time it is scheduled */
  initialEase: number;
}

const DEFAULT_CONFIG: RecallSchedulerConfig = {
  ...DEFAULT_SM2_PARAMETERS,
  initialEase: 2.5,
};

/**
 * RecallScheduler provides the SM-2 scheduling operations on SchedulerState.
 *
 * @example
 * ```typescript
 * const scheduler = new RecallScheduler();
 * const fresh = scheduler.createInitialState('2024-01-15');
 * const next = scheduler.applyGrade(fresh, 5, '2024-01-15', new Date());
 * // next.intervalDays === 1, next.dueDate === '2024-01-16'
 * ```
 */
export class RecallScheduler {
  private readonly config: RecallSchedulerConfig;

  constructor(config?: Partial<RecallSchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * The state of a line that has never been reviewed. It is due on the day
   * it is created.
   */
  createInitialState(today: CalendarDate): SchedulerState {
    return {
      ease: this.config.initialEase,
      intervalDays: 0,
      reps: 0,
      lapses: 0,
      dueDate: today,
      lastGrade: null,
      lastReviewedAt: null,
    };
  }

  /**
   * Applies a 0-5 grade and returns the new state. The input state is not
   * modified.
   *
   * @param state - Current state (use createInitialState for a new line)
   * @param grade - Recall grade, integer 0..5
   * @param today - Calendar date the review counts for
   * @param now - Timestamp recorded as lastReviewedAt
   * @throws InvalidGradeError if the grade is out of range
   */
  applyGrade(
    state: SchedulerState,
    grade: number,
    today: CalendarDate,
    now: Date
  ): SchedulerState {
    const next = sm2Update(state, grade, this.config);

    return {
      ...next,
      dueDate: addDays(today, next.intervalDays),
      lastGrade: grade,
      lastReviewedAt: now,
    };
  }

  /**
   * Whether a line is due on the given date. Due means the due date is on
   * or before `asOf`.
   */
  isDue(state: Pick<SchedulerState, 'dueDate'>, asOf: CalendarDate): boolean {
    return state.dueDate <= asOf;
  }
}
