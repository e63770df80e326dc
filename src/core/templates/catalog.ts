/**
 * Built-in drill catalog, read from default-templates.json and checked
 * against a zod schema when the module loads.
 */

import { z } from 'zod';
import catalogJson from './default-templates.json';
import type { DrillTemplate } from './types';

export const drillCategorySchema = z.enum(['putting', 'chipping', 'pitching', 'irons', 'driver']);

export const scoringTypeSchema = z.enum(['scored', 'completion']);

const catalogEntrySchema = z.object({
  id: z.string().startsWith('tpl_'),
  name: z.string().min(1),
  description: z.string(),
  category: drillCategorySchema,
  scoringType: scoringTypeSchema,
  defaultMaxScore: z.number().int().positive(),
});

/** Built-in templates in catalog order */
export const DEFAULT_TEMPLATES: readonly DrillTemplate[] = z
  .array(catalogEntrySchema)
  .parse(catalogJson)
  .map((entry) => ({ ...entry, isDefault: true }));

const DEFAULT_IDS = new Set(DEFAULT_TEMPLATES.map((template) => template.id));

export function isDefaultTemplateId(id: string): boolean {
  return DEFAULT_IDS.has(id);
}
