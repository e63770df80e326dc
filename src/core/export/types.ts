/**
 * Data Export Types for the Golf Practice Log
 *
 * This module defines the export formats, the date ranges offered when
 * exporting, and the JSON document shape written by JSON exports.
 *
 * The JSON shape is the external contract for backups: field names here are
 * what other tools read, so they intentionally differ from the domain model
 * in a few places (`locationType` carries the course type,
 * `locationLatitude`/`locationLongitude` carry the coordinates).
 */

/**
 * Output format for an export.
 * - 'csv': one row per drill, suitable for spreadsheets and re-import
 * - 'json': nested sessions and drills, for backups and other tools
 */
export type ExportFormat = 'csv' | 'json';

export interface ExportFormatInfo {
  /** File extension without the dot */
  extension: string;
  /** MIME type for downloads and share sheets */
  mimeType: string;
}

export const EXPORT_FORMATS: Record<ExportFormat, ExportFormatInfo> = {
  csv: { extension: 'csv', mimeType: 'text/csv' },
  json: { extension: 'json', mimeType: 'application/json' },
};

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'csv' || value === 'json';
}

/**
 * How far back an export reaches.
 */
export type ExportDateRange = 'week' | 'month' | 'threeMonths' | 'sixMonths' | 'year' | 'all';

export const EXPORT_DATE_RANGES: readonly ExportDateRange[] = [
  'week',
  'month',
  'threeMonths',
  'sixMonths',
  'year',
  'all',
] as const;

/**
 * Labels shown when offering a range to the golfer.
 */
export const EXPORT_DATE_RANGE_LABELS: Record<ExportDateRange, string> = {
  week: 'Last Week',
  month: 'Last Month',
  threeMonths: 'Last 3 Months',
  sixMonths: 'Last 6 Months',
  year: 'Last Year',
  all: 'All Time',
};

export function isExportDateRange(value: string): value is ExportDateRange {
  return EXPORT_DATE_RANGES.some((range) => range === value);
}

/**
 * A drill as written to JSON exports.
 */
export interface DrillExport {
  id: string;
  name: string;
  description: string | null;
  /** Category tag, e.g. 'putting' */
  category: string;
  maxScore: number | null;
  actualScore: number | null;
  isCompleted: boolean | null;
  notes: string | null;
  /** ISO-8601 timestamp */
  completedAt: string | null;
}

/**
 * A session as written to JSON exports.
 */
export interface SessionExport {
  id: string;
  /** ISO-8601 timestamp */
  date: string;
  notes: string | null;

  // Weather data
  temperature: number | null;
  weatherCondition: string | null;
  weatherDescription: string | null;
  humidity: number | null;
  feelsLikeTemperature: number | null;

  // Wind data
  windSpeed: number | null;
  windDirection: number | null;
  windDirectionText: string | null;

  // Location data
  locationName: string | null;
  locationType: string | null;
  locationLatitude: number | null;
  locationLongitude: number | null;

  drills: DrillExport[];
}

/**
 * Top-level JSON export document.
 *
 * @example
 * ```json
 * {
 *   "exportDate": "2024-01-20T15:00:00.000Z",
 *   "sessions": [],
 *   "totalDrills": 0,
 *   "totalSessions": 0,
 *   "version": "1.0"
 * }
 * ```
 */
export interface ExportContainer {
  /** When the export was produced (ISO-8601) */
  exportDate: string;
  /** Document format version */
  version: string;
  totalSessions: number;
  totalDrills: number;
  sessions: SessionExport[];
}

/** Version written to the `version` field of JSON exports */
export const EXPORT_VERSION = '1.0';
