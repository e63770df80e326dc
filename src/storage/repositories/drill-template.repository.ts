/**
 * Drill Template Repository
 *
 * Stores custom templates and changes to the built-in catalog in the
 * drill_templates table. The catalog itself is never written here.
 */

import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { drillTemplates, type DrillTemplateRow } from '../schema';
import type { StoredTemplate, TemplateStore } from '@/core/templates';

function mapToDomain(row: DrillTemplateRow): StoredTemplate {
  return {
    template: {
      id: row.id,
      name: row.name,
      description: row.description,
      category: row.category,
      scoringType: row.scoringType,
      defaultMaxScore: row.defaultMaxScore,
      isDefault: row.isDefault,
    },
    isDeleted: row.isDeleted,
  };
}

export class DrillTemplateRepository implements TemplateStore {
  constructor(private readonly db: AppDatabase) {}

  async listStored(): Promise<StoredTemplate[]> {
    const rows = await this.db
      .select()
      .from(drillTemplates)
      .orderBy(asc(drillTemplates.name), asc(drillTemplates.id));

    return rows.map(mapToDomain);
  }

  async put(entry: StoredTemplate): Promise<void> {
    const values = { ...entry.template, isDeleted: entry.isDeleted, updatedAt: new Date() };

    await this.db
      .insert(drillTemplates)
      .values(values)
      .onConflictDoUpdate({ target: drillTemplates.id, set: values });
  }

  async remove(id: string): Promise<void> {
    await this.db.delete(drillTemplates).where(eq(drillTemplates.id, id));
  }

  async clear(): Promise<void> {
    await this.db.delete(drillTemplates);
  }
}
