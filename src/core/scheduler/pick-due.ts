/**
 * Due-line selection.
 */

import type { CalendarDate, ScheduledOpening } from '../models';

function compareScheduled(a: ScheduledOpening, b: ScheduledOpening): number {
  if (a.dueDate !== b.dueDate) {
    return a.dueDate < b.dueDate ? -1 : 1;
  }
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  return 0;
}

/**
 * Picks the lines to study.
 *
 * Returns the lines due on or before `asOf`, ordered by due date then name
 * and capped at `limit`. When nothing is due it returns the soonest upcoming
 * lines in the same order instead, so a caller with at least one scheduled
 * line always gets a candidate.
 *
 * Only lines that already have scheduler state can be picked; ensure cards
 * exist first.
 *
 * @throws RangeError if `limit` is not an integer
 */
export function pickDue<T extends ScheduledOpening>(
  scheduled: readonly T[],
  asOf: CalendarDate,
  limit: number
): T[] {
  if (!Number.isInteger(limit)) {
    throw new RangeError(`Limit must be an integer, got ${limit}`);
  }
  if (limit <= 0) {
    return [];
  }

  const ordered = [...scheduled].sort(compareScheduled);
  const due = ordered.filter((opening) => opening.dueDate <= asOf);

  return (due.length > 0 ? due : ordered).slice(0, limit);
}
