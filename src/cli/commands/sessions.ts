/**
 * CLI Sessions Command
 *
 * Lists the most recent practice sessions with their drill counts and
 * average success.
 *
 * ```bash
 * npm run cli -- sessions --limit 5
 * ```
 */

import { Command } from 'commander';
import { formatMediumDateTime } from '../../core/dates';
import {
  averageSuccessPercentage,
  locationSummary,
  totalDrills,
  type PracticeSession,
} from '../../core/models';
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

const DEFAULT_LIMIT = 10;

/**
 * Parses `--limit`, falling back to the default for anything that is not a
 * positive integer.
 */
export function parseLimit(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    return DEFAULT_LIMIT;
  }
  const limit = parseInt(value, 10);
  return limit > 0 ? limit : DEFAULT_LIMIT;
}

/**
 * Prints the newest `limit` sessions and returns them.
 */
export async function runSessionsList(ctx: CliContext, limit: number): Promise<PracticeSession[]> {
  const sessions = (await ctx.repository.findAll()).slice(0, limit);

  printBlankLine();
  console.log(bold('Recent Practice Sessions'));
  console.log(formatSeparator(60));

  if (sessions.length === 0) {
    console.log(yellow('  No practice sessions found.'));
    console.log(dim('  Import a CSV file with: npm run cli -- import <file>'));
  }

  for (const session of sessions) {
    const drills = totalDrills(session);
    console.log(`  ${bold(formatMediumDateTime(session.date))}  ${locationSummary(session)}`);
    console.log(
      `    ${drills} ${drills === 1 ? 'drill' : 'drills'}, ` +
        `${formatPercentage(averageSuccessPercentage(session))} average success`
    );
    if (session.notes !== null) {
      console.log(`    ${dim(session.notes)}`);
    }
    console.log(`    ${dim(session.id)}`);
  }

  console.log(formatSeparator(60));
  printBlankLine();

  return sessions;
}

/**
 * Creates the `sessions` command.
 */
export function createSessionsCommand(getContext: () => Promise<CliContext>): Command {
  return new Command('sessions')
    .description('List recent practice sessions')
    .option('-n, --limit <n>', 'Number of sessions to show', String(DEFAULT_LIMIT))
    .action(async (options: { limit?: string }) => {
      try {
        await runSessionsList(await getContext(), parseLimit(options.limit));
      } catch (error) {
        printError(error);
      }
    });
}
