/**
 * Practice Module - logging sessions from templates, and statistics
 *
 * @example
 * ```typescript
 * import { PracticeLogService, practiceStats } from '@/core/practice';
 *
 * const practiceLog = new PracticeLogService(templates, repository);
 * await practiceLog.logSession({ drills: [{ templateId: 'tpl_putting_gate', score: 8 }] });
 * console.log(practiceStats(await repository.findAll()).categories);
 * ```
 */

export {
  PracticeLogService,
  buildDrill,
  resolveConditions,
  type DrillResultInput,
  type LogSessionInput,
  type NewPracticeSession,
  type SessionWriter,
} from './practice-log';
export { LogSessionError, type LogSessionErrorKind } from './errors';
export {
  SUCCESS_THRESHOLD,
  categoryStats,
  practiceStats,
  isSuccessfulDrill,
  type CategoryStats,
  type PracticeStats,
} from './stats';
