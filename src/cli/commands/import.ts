/**
 * CLI Import Command
 *
 * Imports practice sessions from a CSV file, skipping sessions that are
 * already logged.
 *
 * ```bash
 * npm run cli -- import ~/Downloads/golf_practice_data_2024-01-15_09-30.csv
 * ```
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { summarizeImportResult, type ImportIssue, type ImportResult } from '../../core/import';
import type { CliContext } from '../context';
import { bold, dim, green, yellow, formatSeparator, printBlankLine, printError } from '../utils/terminal';

/**
 * One printable line per recoverable issue.
 *
 * @example
 * formatIssue({ kind: 'unknownCategory', message: 'Unknown drill category found in CSV file.', row: 3, value: 'Bunker' });
 * // 'Row 3: Unknown drill category found in CSV file. ("Bunker")'
 */
export function formatIssue(issue: ImportIssue): string {
  const location = issue.row !== undefined ? `Row ${issue.row}: ` : '';
  const value = issue.value !== undefined ? ` ("${issue.value}")` : '';
  return `${location}${issue.message}${value}`;
}

/**
 * Reads the file and imports it. File-level failures propagate as
 * ImportError.
 */
export async function runImport(ctx: CliContext, filePath: string): Promise<ImportResult> {
  const bytes = new Uint8Array(await readFile(filePath));
  const result = await ctx.importService.importFromCsv(bytes);

  printBlankLine();
  console.log(bold('Import Complete'));
  console.log(formatSeparator(40));
  const summary = summarizeImportResult(result);
  for (const line of summary.split('\n')) {
    console.log(result.sessionsImported > 0 ? green(`  ${line}`) : yellow(`  ${line}`));
  }

  if (result.errors.length > 0) {
    printBlankLine();
    console.log(bold('Problems:'));
    for (const issue of result.errors) {
      console.log(yellow(`  ${formatIssue(issue)}`));
    }
  }
  printBlankLine();
  console.log(dim(`  Source: ${filePath}`));
  printBlankLine();

  return result;
}

/**
 * Creates the `import <file>` command.
 */
export function createImportCommand(getContext: () => Promise<CliContext>): Command {
  return new Command('import')
    .description('Import practice sessions from a CSV file')
    .argument('<file>', 'CSV file to import')
    .action(async (file: string) => {
      try {
        await runImport(await getContext(), file);
      } catch (error) {
        printError(error);
      }
    });
}
