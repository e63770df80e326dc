/**
 * CLI Log Command
 *
 * Logs a practice session from drill templates. Each `--drill` names a
 * template id and its result:
 *
 * ```bash
 * npm run cli -- log \
 *   --drill tpl_putting_gate=8 \
 *   --drill tpl_irons_target_green=6/12 \
 *   --drill tpl_putting_lag=done \
 *   --course "Eastside Driving Range" --notes "Windy"
 * ```
 *
 * Results: `8` (score), `6/12` (score out of a custom attempt count),
 * `done` or `missed` (completion drills).
 */

import { Command } from 'commander';
import { formatMediumDateTime } from '../../core/dates';
import { displayScore, type PracticeSession } from '../../core/models';
import type { DrillResultInput, LogSessionInput } from '../../core/practice';
import type { CliContext } from '../context';
import { bold, dim, green, formatSeparator, printBlankLine, printError } from '../utils/terminal';

interface LogCommandOptions {
  drill: string[];
  notes?: string;
  course?: string;
  location?: string;
}

const DRILL_SPEC = /^([^=\s]+)=(.+)$/;
const SCORE = /^(\d+)(?:\/(\d+))?$/;

/**
 * Parses one `--drill` value.
 *
 * @throws Error explaining the accepted forms
 *
 * @example
 * parseDrillSpec('tpl_putting_gate=8');     // { templateId: 'tpl_putting_gate', score: 8 }
 * parseDrillSpec('tpl_irons_ladder=done');  // { templateId: 'tpl_irons_ladder', isCompleted: true }
 */
export function parseDrillSpec(spec: string): DrillResultInput {
  const match = DRILL_SPEC.exec(spec.trim());
  if (!match) {
    throw new Error(`Invalid drill "${spec}". Use <template-id>=<result>, e.g. tpl_putting_gate=8.`);
  }
  const [, templateId, result] = match;
  const outcome = result.toLowerCase();

  if (outcome === 'done') {
    return { templateId, isCompleted: true };
  }
  if (outcome === 'missed') {
    return { templateId, isCompleted: false };
  }

  const score = SCORE.exec(outcome);
  if (!score) {
    throw new Error(`Invalid result "${result}" for ${templateId}. Use a score, score/attempts, done or missed.`);
  }
  const [, actual, attempts] = score;
  return attempts === undefined
    ? { templateId, score: parseInt(actual, 10) }
    : { templateId, score: parseInt(actual, 10), maxScore: parseInt(attempts, 10) };
}

export function parseLogOptions(options: LogCommandOptions): LogSessionInput {
  return {
    notes: options.notes ?? null,
    drills: options.drill.map(parseDrillSpec),
    conditions: {
      courseName: options.course ?? null,
      locationName: options.location ?? null,
    },
  };
}

/**
 * Stores the session and prints what was logged.
 */
export async function runLog(ctx: CliContext, input: LogSessionInput): Promise<PracticeSession> {
  const session = await ctx.practiceLog.logSession(input);

  printBlankLine();
  console.log(bold('Practice Session Logged'));
  console.log(formatSeparator(40));
  console.log(`  ${formatMediumDateTime(session.date)}`);
  if (session.courseName !== null) {
    console.log(`  ${session.courseName} ${dim(`(${session.courseType ?? 'Golf Course'})`)}`);
  }
  for (const drill of session.drills) {
    console.log(`  ${drill.name}: ${displayScore(drill)}`);
  }
  printBlankLine();
  console.log(green(`  Saved as ${session.id}`));
  printBlankLine();

  return session;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createLogCommand(getContext: () => Promise<CliContext>): Command {
  return new Command('log')
    .description('Log a practice session from drill templates')
    .option('-d, --drill <template=result>', 'Drill result, repeatable', collect, [])
    .option('-n, --notes <text>', 'Session notes')
    .option('-c, --course <name>', 'Course or facility name')
    .option('-l, --location <name>', 'Location, e.g. "Austin, TX"')
    .action(async (options: LogCommandOptions) => {
      try {
        await runLog(await getContext(), parseLogOptions(options));
      } catch (error) {
        printError(error);
      }
    });
}
