/**
 * Study Service
 *
 * Connects the SM-2 scheduler to storage: creates missing study cards,
 * applies grades atomically, and selects the lines to review next.
 *
 * Like the scheduler, the service never reads the clock. Callers pass the
 * calendar date (`today`/`asOf`) and the review timestamp (`now`).
 */

import { assertGrade, pickDue, RecallScheduler } from '../scheduler';
import { OpeningNotFoundError } from '../errors';
import type {
  CalendarDate,
  ReviewMetadata,
  ScheduledOpening,
  SchedulerState,
} from '../models';
import type { OpeningRepository } from '../../storage/repositories/opening.repository';
import type {
  AppliedReview,
  StudyCardRepository,
} from '../../storage/repositories/study-card.repository';

export interface GradeInput {
  openingId: string;
  grade: number;
  /** Defaults to a manual grade with no typed attempt */
  metadata?: ReviewMetadata;
}

/**
 * @example
 * ```typescript
 * const study = new StudyService(openingRepo, cardRepo);
 * const [next] = await study.pickDue('Scotch', today, 1);
 * await study.applyGrade({ openingId: next.id, grade: 4 }, today, new Date());
 * ```
 */
export class StudyService {
  constructor(
    private readonly openings: OpeningRepository,
    private readonly cards: StudyCardRepository,
    private readonly scheduler: RecallScheduler = new RecallScheduler()
  ) {}

  /**
   * Creates a card, due `today`, for every opening under `prefix` without
   * one.
   *
   * @returns How many cards were created
   */
  async ensureCards(prefix: string, today: CalendarDate): Promise<number> {
    return this.cards.ensureForPrefix(prefix, this.scheduler.createInitialState(today));
  }

  /**
   * Applies a grade to an opening's card and appends the review log entry in
   * one transaction. A missing card is created first, due `today`.
   *
   * @throws InvalidGradeError before any storage access if the grade is not
   *   an integer 0..5
   * @throws OpeningNotFoundError if the opening does not exist
   */
  async applyGrade(input: GradeInput, today: CalendarDate, now: Date): Promise<AppliedReview> {
    assertGrade(input.grade);
    const grade = input.grade;

    const opening = await this.openings.findById(input.openingId);
    if (!opening) {
      throw new OpeningNotFoundError(input.openingId);
    }

    return this.cards.applyReview(
      {
        openingId: opening.id,
        grade,
        initial: this.scheduler.createInitialState(today),
        now,
        metadata: input.metadata ?? { promptMode: 'manual' },
      },
      (current) => this.scheduler.applyGrade(current, grade, today, now)
    );
  }

  /**
   * The next lines to review under `prefix`: those due by `asOf`, or the
   * soonest upcoming ones when nothing is due. Cards are ensured first, so
   * every matching opening is a candidate.
   */
  async pickDue(prefix: string, asOf: CalendarDate, limit: number): Promise<ScheduledOpening[]> {
    await this.ensureCards(prefix, asOf);
    return pickDue(await this.cards.findScheduled(prefix), asOf, limit);
  }

  /**
   * Only the lines actually due by `asOf`, without the upcoming fallback.
   */
  async listDue(prefix: string, asOf: CalendarDate, limit: number): Promise<ScheduledOpening[]> {
    const picked = await this.pickDue(prefix, asOf, limit);
    return picked.filter((opening) => opening.dueDate <= asOf);
  }

  async getState(openingId: string): Promise<SchedulerState | null> {
    return this.cards.findByOpeningId(openingId);
  }
}
