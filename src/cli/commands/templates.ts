/**
 * CLI Templates Command
 *
 * Lists the drill templates available to `log`, grouped by category.
 *
 * ```bash
 * npm run cli -- templates --category putting
 * ```
 */

import { Command } from 'commander';
import {
  CATEGORY_DISPLAY_NAMES,
  DRILL_CATEGORIES,
  isDrillCategory,
  type DrillCategory,
} from '../../core/models';
import type { DrillTemplate } from '../../core/templates';
import type { CliContext } from '../context';
import { bold, dim, formatSeparator, printBlankLine, printError } from '../utils/terminal';

export function parseCategory(value: string | undefined): DrillCategory | undefined {
  if (value === undefined) {
    return undefined;
  }
  const category = value.toLowerCase();
  if (!isDrillCategory(category)) {
    throw new Error(`Unknown category "${value}". Use one of: ${DRILL_CATEGORIES.join(', ')}.`);
  }
  return category;
}

/** e.g. "tpl_putting_gate  Gate Drill (out of 10)" */
export function formatTemplate(template: DrillTemplate): string {
  const scoring =
    template.scoringType === 'scored' ? `out of ${template.defaultMaxScore}` : 'completion';
  const custom = template.isDefault ? '' : ' [custom]';
  return `${template.id}  ${template.name} (${scoring})${custom}`;
}

export async function runTemplatesList(
  ctx: CliContext,
  category?: DrillCategory
): Promise<DrillTemplate[]> {
  const templates = await ctx.templateService.listTemplates(category);

  printBlankLine();
  console.log(bold('Drill Templates'));
  console.log(formatSeparator(60));

  for (const group of DRILL_CATEGORIES) {
    const inGroup = templates.filter((template) => template.category === group);
    if (inGroup.length === 0) {
      continue;
    }
    console.log(`  ${bold(CATEGORY_DISPLAY_NAMES[group])}`);
    for (const template of inGroup) {
      console.log(`    ${formatTemplate(template)}`);
      console.log(`      ${dim(template.description)}`);
    }
  }

  console.log(formatSeparator(60));
  printBlankLine();

  return templates;
}

export function createTemplatesCommand(getContext: () => Promise<CliContext>): Command {
  return new Command('templates')
    .description('List drill templates')
    .option('-c, --category <category>', `Only one category (${DRILL_CATEGORIES.join(', ')})`)
    .action(async (options: { category?: string }) => {
      try {
        await runTemplatesList(await getContext(), parseCategory(options.category));
      } catch (error) {
        printError(error);
      }
    });
}
