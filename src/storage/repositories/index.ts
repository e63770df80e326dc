/**
 * @example
 * ```typescript
 * import { PracticeSessionRepository } from '@/storage/repositories';
 *
 * const repository = new PracticeSessionRepository(db);
 * ```
 */

export type { Repository } from './base';

export {
  PracticeSessionRepository,
  type CreatePracticeSessionInput,
  type CreateDrillInput,
} from './practice-session.repository';

export { DrillTemplateRepository } from './drill-template.repository';
