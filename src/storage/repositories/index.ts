/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { OpeningRepository, StudyCardRepository } from '@/storage/repositories';
 *
 * const openings = new OpeningRepository(db);
 * const cards = new StudyCardRepository(db);
 * ```
 */

export type { Repository } from './base';

export { OpeningRepository, type CreateOpeningInput } from './opening.repository';

export {
  StudyCardRepository,
  type ApplyReviewInput,
  type AppliedReview,
} from './study-card.repository';

export { ReviewLogRepository } from './review-log.repository';

export { NoteRepository } from './note.repository';

export { EvaluationRepository } from './evaluation.repository';
