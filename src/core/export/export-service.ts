/**
 * Data Export Service for the Golf Practice Log
 *
 * Serializes practice sessions to CSV or JSON text for sharing and backups.
 * The service holds no state: the caller hands over the sessions to export
 * and receives the document back.
 *
 * Key features:
 * - CSV export writes one row per drill, repeating the session fields
 * - CSV dates use the same medium form the importer reads back
 * - JSON export is deterministic (sorted keys, two-space indentation)
 *
 * @example
 * ```typescript
 * const exportService = new ExportService();
 *
 * const csv = exportService.exportData(sessions, 'csv');
 * const fileName = generateFileName('csv');
 * // 'golf_practice_data_2024-01-20_15-04.csv'
 * ```
 */

import { escapeCsvField, EXTENDED_HEADER } from '../csv';
import { formatFileTimestamp, formatMediumDateTime } from '../dates';
import {
  CATEGORY_DISPLAY_NAMES,
  totalDrills,
  type Drill,
  type PracticeSession,
} from '../models';
import type { DrillExport, ExportContainer, ExportFormat, SessionExport } from './types';
import { EXPORT_FORMATS, EXPORT_VERSION } from './types';

/** Number of drill columns left empty for a session without drills */
const DRILL_COLUMN_COUNT = 8;

export interface ExportOptions {
  /** Timestamp written to `exportDate` in JSON exports (defaults to now) */
  now?: Date;
}

/**
 * Service for exporting practice sessions in CSV and JSON.
 */
export class ExportService {
  /**
   * Export sessions in the requested format.
   *
   * Sessions are written in the order given.
   *
   * @param sessions - Sessions to export, drills included
   * @param format - Output format
   * @param options - Optional export settings
   * @returns The CSV or JSON document
   */
  exportData(
    sessions: readonly PracticeSession[],
    format: ExportFormat,
    options: ExportOptions = {}
  ): string {
    switch (format) {
      case 'csv':
        return this.toCSV(sessions);
      case 'json':
        return this.toJSON(sessions, options.now ?? new Date());
    }
  }

  // ============================================================================
  // CSV
  // ============================================================================

  /**
   * Convert sessions to CSV.
   *
   * Every value is quoted, including empty ones. A session without drills
   * gets a single row whose drill columns are left bare.
   */
  private toCSV(sessions: readonly PracticeSession[]): string {
    let csv = `${EXTENDED_HEADER}\n`;

    for (const session of sessions) {
      const sessionFields = this.sessionFields(session);

      if (session.drills.length === 0) {
        csv += `${sessionFields.join(',')}${','.repeat(DRILL_COLUMN_COUNT)}\n`;
        continue;
      }

      for (const drill of session.drills) {
        csv += `${[...sessionFields, ...this.drillFields(drill)].join(',')}\n`;
      }
    }

    return csv;
  }

  /**
   * The 14 session-level columns, already escaped.
   */
  private sessionFields(session: PracticeSession): string[] {
    return [
      formatMediumDateTime(session.date),
      session.notes,
      session.temperature,
      session.weatherCondition,
      session.weatherDescription,
      session.humidity,
      session.feelsLikeTemperature,
      session.windSpeed,
      session.windDirection,
      session.windDirectionText,
      session.locationName,
      session.courseType,
      session.latitude,
      session.longitude,
    ].map(escapeCsvField);
  }

  /**
   * The 8 drill columns, already escaped.
   */
  private drillFields(drill: Drill): string[] {
    return [
      drill.name,
      drill.description,
      CATEGORY_DISPLAY_NAMES[drill.category],
      drill.maxScore,
      drill.actualScore,
      formatSuccessRate(drill),
      drill.notes,
      formatMediumDateTime(drill.completedAt),
    ].map(escapeCsvField);
  }

  // ============================================================================
  // JSON
  // ============================================================================

  private toJSON(sessions: readonly PracticeSession[], now: Date): string {
    const container: ExportContainer = {
      exportDate: now.toISOString(),
      version: EXPORT_VERSION,
      totalSessions: sessions.length,
      totalDrills: sessions.reduce((sum, session) => sum + totalDrills(session), 0),
      sessions: sessions.map(mapSessionToExport),
    };

    return JSON.stringify(container, sortObjectKeys, 2);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Success rate column for a drill.
 *
 * Drills carrying both scores with a positive max render the percentage to
 * one decimal place. Drills carrying a completion flag render 100% or 0%.
 * Anything else renders empty.
 *
 * @example
 * ```typescript
 * formatSuccessRate({ ...drill, maxScore: 10, actualScore: 8 }); // '80.0%'
 * formatSuccessRate({ ...drill, maxScore: 3, actualScore: 1 });  // '33.3%'
 * ```
 */
export function formatSuccessRate(drill: Drill): string {
  const { maxScore, actualScore, isCompleted } = drill;
  if (maxScore !== null && actualScore !== null && maxScore > 0) {
    return `${((actualScore / maxScore) * 100).toFixed(1)}%`;
  }
  if (isCompleted !== null) {
    return isCompleted ? '100%' : '0%';
  }
  return '';
}

/**
 * Map a drill to its JSON export shape.
 */
export function mapDrillToExport(drill: Drill): DrillExport {
  return {
    id: drill.id,
    name: drill.name,
    description: drill.description,
    category: drill.category,
    maxScore: drill.maxScore,
    actualScore: drill.actualScore,
    isCompleted: drill.isCompleted,
    notes: drill.notes,
    completedAt: drill.completedAt.toISOString(),
  };
}

/**
 * Map a session to its JSON export shape.
 */
export function mapSessionToExport(session: PracticeSession): SessionExport {
  return {
    id: session.id,
    date: session.date.toISOString(),
    notes: session.notes,
    temperature: session.temperature,
    weatherCondition: session.weatherCondition,
    weatherDescription: session.weatherDescription,
    humidity: session.humidity,
    feelsLikeTemperature: session.feelsLikeTemperature,
    windSpeed: session.windSpeed,
    windDirection: session.windDirection,
    windDirectionText: session.windDirectionText,
    locationName: session.locationName,
    locationType: session.courseType,
    locationLatitude: session.latitude,
    locationLongitude: session.longitude,
    drills: session.drills.map(mapDrillToExport),
  };
}

/**
 * JSON.stringify replacer that rebuilds every plain object with its keys
 * in sorted order.
 */
function sortObjectKeys(_key: string, value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
}

/**
 * Build the file name for an export.
 *
 * @example
 * ```typescript
 * generateFileName('json', new Date(2024, 0, 20, 15, 4));
 * // 'golf_practice_data_2024-01-20_15-04.json'
 * ```
 */
export function generateFileName(format: ExportFormat, now: Date = new Date()): string {
  return `golf_practice_data_${formatFileTimestamp(now)}.${EXPORT_FORMATS[format].extension}`;
}
