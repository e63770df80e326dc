/**
 * Transfer API Routes
 *
 * CSV/JSON export as a file download, and CSV import into the session
 * store.
 *
 * Endpoints:
 * - GET /export?format=csv|json&range= - Download practice data
 * - POST /import - Import a CSV file sent as the raw request body
 *
 * @example
 * ```bash
 * curl -OJ 'http://localhost:3001/api/export?format=json&range=month'
 * curl --data-binary @practice.csv -H 'Content-Type: text/csv' \
 *   http://localhost:3001/api/import
 * ```
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import {
  EXPORT_FORMATS,
  filterSessionsByRange,
  generateFileName,
  type ExportService,
} from '@/core/export';
import { summarizeImportResult, type ImportResult, type ImportService } from '@/core/import';
import type { PracticeSessionRepository } from '@/storage';
import { success, error, badRequest, download } from '../utils/response';
import { ErrorCodes } from '../middleware/error-handler';
import { exportQuerySchema, toValidationDetails } from '../types';

/**
 * Body of a successful import response.
 */
export interface ImportResponse {
  result: ImportResult;
  /** Human-readable summary, one line per non-zero count */
  summary: string;
}

export interface TransferRouteOptions {
  repository: PracticeSessionRepository;
  exportService: ExportService;
  importService: ImportService;
  /** Largest accepted import body in bytes */
  maxImportBytes: number;
  clock?: () => Date;
}

/**
 * Creates the transfer router, mounted under `/api`.
 */
export function transferRoutes(options: TransferRouteOptions): Hono {
  const { repository, exportService, importService, maxImportBytes } = options;
  const clock = options.clock ?? (() => new Date());
  const router = new Hono();

  /**
   * GET /export
   *
   * Query parameters:
   * - format: csv | json (default csv)
   * - range: week | month | threeMonths | sixMonths | year | all (default all)
   *
   * Response:
   * - 200 OK: the file, with Content-Disposition naming it
   * - 400 Bad Request: invalid query
   */
  router.get('/export', async (c) => {
    const parsed = exportQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return badRequest(c, 'Invalid query parameters', toValidationDetails(parsed.error));
    }

    const { format, range } = parsed.data;
    const now = clock();
    const sessions = filterSessionsByRange(await repository.findAll(), range, now);
    const body = exportService.exportData(sessions, format, { now });
    const fileName = generateFileName(format, now);

    console.log(`[Export] ${sessions.length} sessions as ${format} (${range})`);

    return download(c, body, { name: fileName, mimeType: EXPORT_FORMATS[format].mimeType });
  });

  /**
   * POST /import
   *
   * The request body is the CSV file itself.
   *
   * Response:
   * - 200 OK: { result, summary }; row-level problems are listed in result.errors
   * - 400 Bad Request: IMPORT_FAILED when the file is unreadable, empty or has no valid header
   * - 413 Payload Too Large: body exceeds the configured limit
   */
  router.post(
    '/import',
    bodyLimit({
      maxSize: maxImportBytes,
      onError: (c) =>
        error(
          c,
          ErrorCodes.PAYLOAD_TOO_LARGE,
          `Import file exceeds the ${maxImportBytes} byte limit`,
          413,
          { maxBytes: maxImportBytes }
        ),
    }),
    async (c) => {
      const bytes = new Uint8Array(await c.req.arrayBuffer());
      const result = await importService.importFromCsv(bytes);

      console.log(
        `[Import] ${result.sessionsImported} sessions, ${result.drillsImported} drills imported; ` +
          `${result.duplicatesSkipped} duplicates skipped, ${result.errors.length} errors`
      );

      const response: ImportResponse = {
        result,
        summary: summarizeImportResult(result),
      };

      return success(c, response);
    }
  );

  return router;
}
