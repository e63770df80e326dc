/**
 * Human-readable summary of an import, one line per non-zero count.
 */

import type { ImportResult } from './types';

function pluralize(count: number, singular: string, plural: string): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Summarize an import result for display.
 *
 * @example
 * ```typescript
 * summarizeImportResult({ sessionsImported: 2, drillsImported: 1, duplicatesSkipped: 0, errors: [] });
 * // '2 sessions imported\n1 drill imported'
 * ```
 */
export function summarizeImportResult(result: ImportResult): string {
  const lines: string[] = [];

  if (result.sessionsImported > 0) {
    lines.push(`${pluralize(result.sessionsImported, 'session', 'sessions')} imported`);
  }
  if (result.drillsImported > 0) {
    lines.push(`${pluralize(result.drillsImported, 'drill', 'drills')} imported`);
  }
  if (result.duplicatesSkipped > 0) {
    lines.push(`${pluralize(result.duplicatesSkipped, 'duplicate', 'duplicates')} skipped`);
  }
  if (result.errors.length > 0) {
    lines.push(`${pluralize(result.errors.length, 'error', 'errors')} encountered`);
  }

  if (result.sessionsImported === 0 && result.drillsImported === 0) {
    lines.push('No new data was imported');
  }

  return lines.join('\n');
}
