/**
 * Data Import Module - Barrel Export
 *
 * Reads practice CSV files back into sessions and drills.
 *
 * @example
 * ```typescript
 * import { ImportService, ImportError, summarizeImportResult } from '@/core/import';
 *
 * const importService = new ImportService(repository);
 * try {
 *   const result = await importService.importFromCsv(csvText);
 *   console.log(summarizeImportResult(result));
 * } catch (error) {
 *   if (error instanceof ImportError) {
 *     console.error(error.message);
 *   }
 * }
 * ```
 */

export { ImportService } from './import-service';
export { summarizeImportResult } from './summary';

export type { ImportResult, SessionStore } from './types';

export type { ImportErrorKind, ImportIssue } from './errors';
export { ImportError, IMPORT_ERROR_DESCRIPTIONS, createImportIssue } from './errors';
