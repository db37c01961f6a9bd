/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { openDatabase, OpeningRepository } from '@/storage';
 *   const db = openDatabase(config.database.path);
 */

export {
  createDatabase,
  openDatabase,
  runMigrations,
  closeDatabase,
  MIGRATIONS_FOLDER,
} from './db';
export type { AppDatabase } from './db';

export { openings, studyCards, studyReviews, openingNotes, evaluations } from './schema';

export type {
  Opening,
  NewOpening,
  StudyCard,
  NewStudyCard,
  StudyReview,
  NewStudyReview,
  OpeningNote,
  Evaluation,
  NewEvaluation,
} from './schema';

export {
  OpeningRepository,
  StudyCardRepository,
  ReviewLogRepository,
  NoteRepository,
  EvaluationRepository,
  type Repository,
  type CreateOpeningInput,
  type ApplyReviewInput,
  type AppliedReview,
} from './repositories';
