/**
 * Import Error Types
 *
 * Import problems come in two tiers:
 *
 * 1. Fatal problems with the file as a whole (not UTF-8, empty, unusable
 *    header). These are thrown as {@link ImportError} and nothing is stored.
 * 2. Problems with a single session group or drill row (bad date, unknown
 *    category). These are collected as {@link ImportIssue} values on the
 *    result while the rest of the file keeps importing.
 */

/**
 * Every kind of problem an import can report.
 */
export type ImportErrorKind =
  | 'invalidFileFormat'
  | 'emptyFile'
  | 'invalidHeader'
  | 'invalidDateFormat'
  | 'invalidScoreFormat'
  | 'duplicateSession'
  | 'unknownCategory';

/**
 * User-facing description of each error kind.
 */
export const IMPORT_ERROR_DESCRIPTIONS: Record<ImportErrorKind, string> = {
  invalidFileFormat: 'Invalid file format. Please select a CSV file.',
  emptyFile: 'The selected file is empty.',
  invalidHeader:
    'Invalid CSV header. Expected format: Session Date, Session Notes, Drill Name, Drill Description, Category, Max Score, Actual Score, Success Rate, Drill Notes, Completed At',
  invalidDateFormat: 'Invalid date format in CSV file.',
  invalidScoreFormat: 'Invalid score format in CSV file.',
  duplicateSession: 'Some sessions already exist and will be skipped.',
  unknownCategory: 'Unknown drill category found in CSV file.',
};

/**
 * A recoverable problem found while importing. The import carried on.
 *
 * @example
 * ```typescript
 * const issue: ImportIssue = {
 *   kind: 'unknownCategory',
 *   message: 'Unknown drill category found in CSV file.',
 *   row: 3,
 *   value: 'Bunker',
 * };
 * ```
 */
export interface ImportIssue {
  kind: ImportErrorKind;
  message: string;
  /** 1-based line number in the file, header and blank lines included */
  row?: number;
  /** The offending raw value */
  value?: string;
}

/**
 * Builds an issue carrying the standard description for its kind.
 */
export function createImportIssue(
  kind: ImportErrorKind,
  context: { row?: number; value?: string } = {}
): ImportIssue {
  return {
    kind,
    message: IMPORT_ERROR_DESCRIPTIONS[kind],
    ...(context.row !== undefined && { row: context.row }),
    ...(context.value !== undefined && { value: context.value }),
  };
}

/**
 * Thrown when a file cannot be imported at all.
 *
 * @example
 * ```typescript
 * try {
 *   await importService.importFromCsv(bytes);
 * } catch (error) {
 *   if (error instanceof ImportError && error.kind === 'emptyFile') {
 *     // nothing was written
 *   }
 * }
 * ```
 */
export class ImportError extends Error {
  /** Which problem stopped the import */
  public readonly kind: ImportErrorKind;

  constructor(kind: ImportErrorKind, message: string = IMPORT_ERROR_DESCRIPTIONS[kind]) {
    super(message);
    this.name = 'ImportError';
    this.kind = kind;

    Error.captureStackTrace?.(this, ImportError);
  }
}
