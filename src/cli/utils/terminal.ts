/**
 * Terminal output helpers shared by the CLI commands.
 *
 * ```typescript
 * console.log(bold('Practice Sessions'));
 * console.log(green('  3 sessions imported'));
 * ```
 */

const style =
  (open: number) =>
  (s: string): string =>
    `\x1b[${open}m${s}\x1b[0m`;

export const bold = style(1);
/** Secondary text: ids, hints, separators */
export const dim = style(2);
export const red = style(31);
export const green = style(32);
export const yellow = style(33);

export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Size of a written export file.
 *
 * @example
 * formatBytes(512);     // '512 B'
 * formatBytes(2048);    // '2.0 KB'
 * formatBytes(3145728); // '3.00 MB'
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/** Drill success rate, green from 80% and yellow from 50%. */
export function formatPercentage(percentage: number): string {
  const color = percentage >= 80 ? green : percentage >= 50 ? yellow : red;
  return color(`${percentage}%`);
}

export function printBlankLine(): void {
  console.log('');
}

/** Reports a failed command on stderr and sets a non-zero exit code. */
export function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(red(`Error: ${message}`));
  process.exitCode = 1;
}
