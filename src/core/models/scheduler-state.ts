/**
 * Scheduler Domain Types
 *
 * Each opening line carries one SM-2 scheduler state. The state is created
 * lazily the first time an opening is scheduled or graded and afterwards is
 * only changed by applying a grade.
 */

/**
 * A calendar date in `YYYY-MM-DD` form.
 *
 * Due dates are compared as calendar dates, so a line due "today" is due
 * regardless of the time of day. ISO dates sort lexicographically, which the
 * storage layer relies on.
 */
export type CalendarDate = string;

/**
 * Recall grade on the SM-2 scale.
 *
 * - 0-2: lapse (the line was not recalled well enough, progress resets)
 * - 3: recalled with serious difficulty
 * - 4: recalled after hesitation
 * - 5: perfect recall
 */
export type RecallGrade = 0 | 1 | 2 | 3 | 4 | 5;

/**
 * SM-2 scheduling state for one opening line.
 */
export interface SchedulerState {
  /** Ease factor, always within [1.3, 3.0]. Starts at 2.5. */
  ease: number;

  /** Days until the next review. 0 until the first review. */
  intervalDays: number;

  /** Consecutive successful reviews since the last lapse */
  reps: number;

  /** Total number of lapses (grades below 3) */
  lapses: number;

  /**
   * The date the line is next due. Always the date of the last update plus
   * `intervalDays`; for a fresh state, the creation date.
   */
  dueDate: CalendarDate;

  /** Grade given at the last review, or null if never reviewed */
  lastGrade: number | null;

  /** When the last review happened, or null if never reviewed */
  lastReviewedAt: Date | null;
}

/**
 * An opening paired with its scheduler state, the unit `pickDue` works on.
 */
export interface ScheduledOpening {
  id: string;
  name: string;
  movesSan: string;
  dueDate: CalendarDate;
}
