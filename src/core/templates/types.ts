/**
 * Drill Template Types
 *
 * A template is a reusable drill definition: what the golfer picks from
 * when logging a session. The built-in catalog is fixed; golfers can add
 * their own templates and edit or hide the built-in ones.
 */

import type { DrillCategory, ScoringType } from '../models';

export interface DrillTemplate {
  /** 'tpl_' prefixed; built-in templates use readable ids */
  id: string;
  name: string;
  description: string;
  category: DrillCategory;
  scoringType: ScoringType;
  /** Attempts per run of the drill for scored templates */
  defaultMaxScore: number;
  /** True for templates from the built-in catalog */
  isDefault: boolean;
}

/**
 * Fields a golfer supplies for a custom template.
 */
export type DrillTemplateInput = Omit<DrillTemplate, 'id' | 'isDefault'>;

/**
 * A stored change to the catalog. Custom templates are stored whole;
 * a built-in template is stored only once it has been edited or hidden.
 */
export interface StoredTemplate {
  template: DrillTemplate;
  /** Hides a built-in template */
  isDeleted: boolean;
}

/**
 * Persistence the template service writes through.
 */
export interface TemplateStore {
  /** Every stored template, custom ones ordered by name */
  listStored(): Promise<StoredTemplate[]>;

  /** Inserts or replaces the entry for `entry.template.id` */
  put(entry: StoredTemplate): Promise<void>;

  /** Deletes the entry for `id`; a no-op when there is none */
  remove(id: string): Promise<void>;

  /** Deletes every entry */
  clear(): Promise<void>;
}
