/**
 * CLI Export Command
 *
 * Writes practice sessions to a CSV or JSON file.
 *
 * Usage Examples:
 * ```bash
 * # Export everything as CSV (default format) to a generated file name
 * npm run cli -- export
 *
 * # Export the last month as JSON to a specific file
 * npm run cli -- export --format json --range month --output practice.json
 * ```
 */

import { Command } from 'commander';
import { writeFile, stat } from 'node:fs/promises';
import {
  EXPORT_DATE_RANGES,
  EXPORT_DATE_RANGE_LABELS,
  filterSessionsByRange,
  generateFileName,
  isExportDateRange,
  isExportFormat,
  type ExportDateRange,
  type ExportFormat,
} from '../../core/export';
import type { CliContext } from '../context';
import { bold, dim, green, formatBytes, formatSeparator, printBlankLine, printError } from '../utils/terminal';

/**
 * Raw options as commander hands them over.
 */
interface ExportCommandOptions {
  format: string;
  range: string;
  output?: string;
}

/**
 * Validated export request.
 */
export interface ExportRequest {
  format: ExportFormat;
  range: ExportDateRange;
  /** Output path; defaults to the generated golf_practice_data_* name */
  output?: string;
}

export interface ExportOutcome {
  path: string;
  sessionCount: number;
  bytes: number;
}

/**
 * Validates commander's string options.
 *
 * @throws Error naming the accepted values when an option is unknown
 */
export function parseExportOptions(options: ExportCommandOptions): ExportRequest {
  const format = options.format.toLowerCase();
  if (!isExportFormat(format)) {
    throw new Error(`Unknown format "${options.format}". Use csv or json.`);
  }
  if (!isExportDateRange(options.range)) {
    throw new Error(
      `Unknown range "${options.range}". Use one of: ${EXPORT_DATE_RANGES.join(', ')}.`
    );
  }
  return { format, range: options.range, output: options.output };
}

/**
 * Exports the sessions in range and writes the file.
 */
export async function runExport(ctx: CliContext, request: ExportRequest): Promise<ExportOutcome> {
  const now = ctx.clock();
  const sessions = filterSessionsByRange(await ctx.repository.findAll(), request.range, now);
  const data = ctx.exportService.exportData(sessions, request.format, { now });

  const path = request.output ?? generateFileName(request.format, now);
  await writeFile(path, data, 'utf-8');
  const { size } = await stat(path);

  printBlankLine();
  console.log(bold('Exporting Practice Data'));
  console.log(formatSeparator(40));
  console.log(`  Format: ${dim(request.format)}`);
  console.log(`  Range: ${dim(EXPORT_DATE_RANGE_LABELS[request.range])}`);
  console.log(`  Sessions: ${dim(String(sessions.length))}`);
  printBlankLine();
  console.log(green(`  Exported to ${path}`));
  console.log(dim(`  Size: ${formatBytes(size)}`));
  printBlankLine();

  return { path, sessionCount: sessions.length, bytes: size };
}

/**
 * Creates the `export` command.
 *
 * @param getContext - Opens the dependencies when the command runs
 */
export function createExportCommand(getContext: () => Promise<CliContext>): Command {
  return new Command('export')
    .description('Export practice sessions to a CSV or JSON file')
    .option('-f, --format <format>', 'Output format (csv or json)', 'csv')
    .option('-r, --range <range>', `Date range (${EXPORT_DATE_RANGES.join(', ')})`, 'all')
    .option('-o, --output <file>', 'Output file path')
    .action(async (options: ExportCommandOptions) => {
      try {
        await runExport(await getContext(), parseExportOptions(options));
      } catch (error) {
        printError(error);
      }
    });
}
