/**
 * CLI Entry Point for the Golf Practice Log
 *
 * Available Commands:
 * - `log` - Log a practice session from drill templates
 * - `templates` - List drill templates
 * - `stats` - Totals and success by category
 * - `export` - Export sessions to a CSV or JSON file
 * - `import <file>` - Import sessions from a CSV file
 * - `sessions` - List recent practice sessions
 * - `help` - Show help with available commands
 *
 * Usage:
 * ```bash
 * npm run cli -- log --drill tpl_putting_gate=8 --course "Eastside Driving Range"
 * npm run cli -- stats --range month
 * npm run cli -- export --format json --range month
 * npm run cli -- import practice.csv
 * npm run cli -- sessions --limit 5
 * npm run cli -- help
 * ```
 *
 * The database is opened only when a command runs (DATABASE_PATH, default
 * golf-practice.db) and closed once it finishes.
 */

import { Command } from 'commander';
import { getDatabasePath } from '../config';
import { openCliContext, type OpenCliContext } from './context';
import { createExportCommand } from './commands/export';
import { createImportCommand } from './commands/import';
import { createLogCommand } from './commands/log';
import { createSessionsCommand } from './commands/sessions';
import { createStatsCommand } from './commands/stats';
import { createTemplatesCommand } from './commands/templates';
import { printError } from './utils/terminal';

/**
 * Builds the program; commander adds the `help` command. `getContext` is
 * called by whichever command runs.
 */
function createProgram(getContext: () => Promise<OpenCliContext>): Command {
  const program = new Command('golf-log')
    .description('Log, export and import golf practice sessions')
    .version('0.1.0');

  program.addCommand(createLogCommand(getContext));
  program.addCommand(createTemplatesCommand(getContext));
  program.addCommand(createStatsCommand(getContext));
  program.addCommand(createExportCommand(getContext));
  program.addCommand(createImportCommand(getContext));
  program.addCommand(createSessionsCommand(getContext));

  return program;
}

async function main(): Promise<void> {
  const state: { context: OpenCliContext | null } = { context: null };
  const getContext = async (): Promise<OpenCliContext> => {
    if (state.context === null) {
      state.context = await openCliContext(getDatabasePath());
    }
    return state.context;
  };

  try {
    const program = createProgram(getContext);
    if (process.argv.length <= 2) {
      program.outputHelp();
      return;
    }
    await program.parseAsync(process.argv);
  } finally {
    state.context?.close();
  }
}

main().catch(printError);
