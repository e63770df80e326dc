/**
 * Data Export Module - Barrel Export
 *
 * This module serializes practice sessions to CSV or JSON for sharing and
 * backups, names the exported files, and narrows sessions to a date range.
 *
 * @example
 * ```typescript
 * import {
 *   ExportService,
 *   filterSessionsByRange,
 *   generateFileName,
 *   EXPORT_FORMATS,
 * } from '@/core/export';
 *
 * const recent = filterSessionsByRange(sessions, 'month');
 * const body = new ExportService().exportData(recent, 'json');
 * const fileName = generateFileName('json');
 * const contentType = EXPORT_FORMATS.json.mimeType;
 * ```
 */

// Export service for producing CSV and JSON documents
export {
  ExportService,
  formatSuccessRate,
  mapDrillToExport,
  mapSessionToExport,
  generateFileName,
} from './export-service';
export type { ExportOptions } from './export-service';

// Date range filtering
export { rangeStartDate, filterSessionsByRange } from './date-range';

// Export formats, ranges and the JSON document shape
export type {
  ExportFormat,
  ExportFormatInfo,
  ExportDateRange,
  ExportContainer,
  SessionExport,
  DrillExport,
} from './types';
export {
  EXPORT_FORMATS,
  EXPORT_DATE_RANGES,
  EXPORT_DATE_RANGE_LABELS,
  EXPORT_VERSION,
  isExportFormat,
  isExportDateRange,
} from './types';
