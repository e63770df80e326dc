/**
 * Drill Template Service
 *
 * Presents the built-in catalog merged with what the golfer changed:
 *
 * - built-in templates come first, in catalog order, unless hidden
 * - an edited built-in template replaces the catalog entry in place
 * - custom templates follow, ordered by name
 *
 * Nothing from the catalog is copied into storage until it is edited or
 * hidden, so catalog updates reach templates the golfer never touched.
 */

import { generateTemplateId, type DrillCategory } from '../models';
import { DEFAULT_TEMPLATES, isDefaultTemplateId } from './catalog';
import type { DrillTemplate, DrillTemplateInput, TemplateStore } from './types';

export class DrillTemplateService {
  constructor(private readonly store: TemplateStore) {}

  /**
   * Every visible template, or those of one category.
   */
  async listTemplates(category?: DrillCategory): Promise<DrillTemplate[]> {
    const stored = await this.store.listStored();
    const byId = new Map(stored.map((entry) => [entry.template.id, entry]));

    const builtIn: DrillTemplate[] = [];
    for (const template of DEFAULT_TEMPLATES) {
      const entry = byId.get(template.id);
      if (entry === undefined) {
        builtIn.push(template);
      } else if (!entry.isDeleted) {
        builtIn.push(entry.template);
      }
    }

    const custom = stored
      .filter((entry) => !entry.isDeleted && !isDefaultTemplateId(entry.template.id))
      .map((entry) => entry.template);

    const all = [...builtIn, ...custom];
    return category === undefined ? all : all.filter((template) => template.category === category);
  }

  async getTemplate(id: string): Promise<DrillTemplate | null> {
    const templates = await this.listTemplates();
    return templates.find((template) => template.id === id) ?? null;
  }

  async addCustomTemplate(input: DrillTemplateInput): Promise<DrillTemplate> {
    const template: DrillTemplate = { ...input, id: generateTemplateId(), isDefault: false };
    await this.store.put({ template, isDeleted: false });
    return template;
  }

  /**
   * Applies `changes` to a visible template. Built-in templates keep their
   * id and stay flagged as built-in.
   *
   * @returns The updated template, or null when no visible template has that id
   */
  async updateTemplate(
    id: string,
    changes: Partial<DrillTemplateInput>
  ): Promise<DrillTemplate | null> {
    const current = await this.getTemplate(id);
    if (current === null) {
      return null;
    }

    const updated: DrillTemplate = { ...current, ...changes, id, isDefault: current.isDefault };
    await this.store.put({ template: updated, isDeleted: false });
    return updated;
  }

  /**
   * Deletes a custom template or hides a built-in one.
   *
   * @returns False when no visible template has that id
   */
  async removeTemplate(id: string): Promise<boolean> {
    const current = await this.getTemplate(id);
    if (current === null) {
      return false;
    }

    if (current.isDefault) {
      await this.store.put({ template: current, isDeleted: true });
    } else {
      await this.store.remove(id);
    }
    return true;
  }

  /**
   * Drops custom templates and every change to the built-in ones.
   */
  async resetToDefaults(): Promise<DrillTemplate[]> {
    await this.store.clear();
    return [...DEFAULT_TEMPLATES];
  }
}
