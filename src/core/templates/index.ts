/**
 * Drill Templates Module
 *
 * @example
 * ```typescript
 * import { DrillTemplateService } from '@/core/templates';
 *
 * const templates = new DrillTemplateService(new DrillTemplateRepository(db));
 * const putting = await templates.listTemplates('putting');
 * ```
 */

export type { DrillTemplate, DrillTemplateInput, StoredTemplate, TemplateStore } from './types';
export {
  DEFAULT_TEMPLATES,
  drillCategorySchema,
  scoringTypeSchema,
  isDefaultTemplateId,
} from './catalog';
export { DrillTemplateService } from './template-service';
