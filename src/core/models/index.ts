/**
 * Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import type { OpeningLine, SchedulerState } from '@/core/models';
 * ```
 */

export type { OpeningLine, NamedLine } from './opening';

export type {
  CalendarDate,
  RecallGrade,
  SchedulerState,
  ScheduledOpening,
} from './scheduler-state';

export type { PromptMode, ReviewLogEntry, ReviewMetadata } from './review';

export type { EvaluationResult, StoredEvaluation } from './evaluation';
