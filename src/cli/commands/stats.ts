/**
 * CLI Stats Command
 *
 * Session totals and success by category for a date range.
 *
 * ```bash
 * npm run cli -- stats --range month
 * ```
 */

import { Command } from 'commander';
import {
  EXPORT_DATE_RANGES,
  EXPORT_DATE_RANGE_LABELS,
  filterSessionsByRange,
  isExportDateRange,
  type ExportDateRange,
} from '../../core/export';
import { practiceStats, type PracticeStats } from '../../core/practice';
import type { CliContext } from '../context';
import {
  bold,
  dim,
  yellow,
  formatPercentage,
  formatSeparator,
  printBlankLine,
  printError,
} from '../utils/terminal';

export function parseRange(value: string): ExportDateRange {
  if (!isExportDateRange(value)) {
    throw new Error(`Unknown range "${value}". Use one of: ${EXPORT_DATE_RANGES.join(', ')}.`);
  }
  return value;
}

export async function runStats(ctx: CliContext, range: ExportDateRange): Promise<PracticeStats> {
  const sessions = filterSessionsByRange(await ctx.repository.findAll(), range, ctx.clock());
  const stats = practiceStats(sessions);

  printBlankLine();
  console.log(bold(`Practice Stats: ${EXPORT_DATE_RANGE_LABELS[range]}`));
  console.log(formatSeparator(40));
  console.log(`  Sessions: ${stats.totalSessions}`);
  console.log(`  Drills: ${stats.totalDrills}`);
  console.log(`  Drills per session: ${stats.averageDrillsPerSession.toFixed(1)}`);

  if (stats.categories.length === 0) {
    console.log(yellow('  No drills logged in this range.'));
  } else {
    printBlankLine();
    for (const category of stats.categories) {
      console.log(
        `  ${category.displayName.padEnd(10)} ${dim(`${category.drillCount} drills`)}  ` +
          formatPercentage(category.successPercentage)
      );
    }
  }
  printBlankLine();

  return stats;
}

export function createStatsCommand(getContext: () => Promise<CliContext>): Command {
  return new Command('stats')
    .description('Show practice totals and success by category')
    .option('-r, --range <range>', `Date range (${EXPORT_DATE_RANGES.join(', ')})`, 'all')
    .action(async (options: { range: string }) => {
      try {
        await runStats(await getContext(), parseRange(options.range));
      } catch (error) {
        printError(error);
      }
    });
}
