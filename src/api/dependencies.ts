/**
 * Everything the routes need, built once per app. Tests pass an in-memory
 * database and a fake evaluator; the server passes the configured ones.
 */

import { toCalendarDate } from '@/core/calendar';
import type { CalendarDate } from '@/core/models';
import { StudyService } from '@/core/study';
import type { PositionEvaluator } from '@/engine';
import type { AppDatabase } from '@/storage/db';
import {
  EvaluationRepository,
  NoteRepository,
  OpeningRepository,
  ReviewLogRepository,
  StudyCardRepository,
} from '@/storage/repositories';

export interface ApiDefaults {
  /** Name prefix used when a request gives none */
  prefix: string;
  /** Search depth for POST /api/eval without ?depth */
  evalDepth: number;
}

export interface ApiDependencies {
  openings: OpeningRepository;
  notes: NoteRepository;
  evaluations: EvaluationRepository;
  reviews: ReviewLogRepository;
  study: StudyService;
  evaluator: PositionEvaluator;
  clock: () => Date;
  defaults: ApiDefaults;
}

export interface DependencyOptions {
  evaluator: PositionEvaluator;
  clock?: () => Date;
  defaults?: Partial<ApiDefaults>;
}

const DEFAULTS: ApiDefaults = {
  prefix: '',
  evalDepth: 10,
};

export function createDependencies(db: AppDatabase, options: DependencyOptions): ApiDependencies {
  const openings = new OpeningRepository(db);
  const cards = new StudyCardRepository(db);

  return {
    openings,
    notes: new NoteRepository(db),
    evaluations: new EvaluationRepository(db),
    reviews: new ReviewLogRepository(db),
    study: new StudyService(openings, cards),
    evaluator: options.evaluator,
    clock: options.clock ?? (() => new Date()),
    defaults: { ...DEFAULTS, ...options.defaults },
  };
}

export function today(deps: ApiDependencies): CalendarDate {
  return toCalendarDate(deps.clock());
}
