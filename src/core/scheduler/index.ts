/**
 * Scheduler Module - Barrel Export
 *
 * SM-2 spaced repetition for opening lines.
 *
 * @example
 * ```typescript
 * import { RecallScheduler, pickDue } from '@/core/scheduler';
 * ```
 */

export { RecallScheduler, type RecallSchedulerConfig } from './recall-scheduler';
export {
  sm2Update,
  assertGrade,
  PASSING_GRADE,
  DEFAULT_SM2_PARAMETERS,
  type Sm2Parameters,
  type Sm2Values,
} from './sm2';
export { pickDue } from './pick-due';
