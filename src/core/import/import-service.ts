/**
 * Data Import Service for the Golf Practice Log
 *
 * Reads practice CSV files (both the legacy 10-column layout and the
 * extended 22-column layout written by exports) back into sessions and
 * drills, and adds them to a {@link SessionStore}.
 *
 * Import pipeline:
 * 1. Decode the bytes as UTF-8 and split into non-empty lines, remembering
 *    where each sits in the file
 * 2. Validate the header and work out the column layout
 * 3. Tokenize and map each data line; short lines are dropped
 * 4. Group lines into sessions by their raw date and notes text
 * 5. Per group: parse the date, skip duplicates, build the session and its
 *    drills, then stage it in the store
 * 6. Save once and report what happened; if staging or saving fails, the
 *    staged sessions are discarded before the error propagates
 *
 * Problems with a single group or row are collected on the result rather
 * than aborting the import. Only a file that cannot be read at all throws.
 *
 * @example
 * ```typescript
 * const importService = new ImportService(sessionRepository);
 *
 * const result = await importService.importFromCsv(fileBytes);
 * console.log(summarizeImportResult(result));
 * ```
 */

import { detectSchema, hasRequiredHeaderTerms, mapRow, parseCsvLine, type CsvRow } from '../csv';
import { isSameCalendarDay, parseFlexibleDate } from '../dates';
import {
  categoryFromDisplayName,
  generateDrillId,
  generateSessionId,
  type Drill,
  type PracticeSession,
  type SessionConditions,
} from '../models';
import { createImportIssue, ImportError, type ImportIssue } from './errors';
import type { ImportResult, SessionStore } from './types';

/**
 * A data line after mapping, with its position in the file kept for
 * error reporting.
 */
interface NumberedRow {
  /** 1-based line number in the file, blank lines counted */
  lineNumber: number;
  row: CsvRow;
}

/**
 * A non-empty line of the file.
 */
interface SourceLine {
  text: string;
  /** 1-based line number in the file */
  lineNumber: number;
}

/**
 * Data lines that belong to one session.
 */
interface SessionGroup {
  rawDate: string;
  rawNotes: string;
  rows: NumberedRow[];
}

/**
 * Outcome of building one drill from a row.
 */
type DrillBuildResult = { ok: true; drill: Drill } | { ok: false; issue: ImportIssue };

/**
 * Service that imports practice sessions from CSV.
 *
 * Calls on one instance run one after another, so duplicate detection in
 * a later import always sees the sessions saved by an earlier one.
 */
export class ImportService {
  /** Tail of the queue of imports running on this instance */
  private queue: Promise<unknown> = Promise.resolve();

  /**
   * Creates a new ImportService instance.
   *
   * @param store - Where imported sessions are written
   * @param clock - Source of "now" for drills without a readable completion time
   */
  constructor(
    private readonly store: SessionStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Import sessions from CSV text or raw file bytes.
   *
   * @param input - CSV content as a string, or the file's bytes
   * @returns Counts of what was imported and the problems found
   * @throws ImportError with kind 'invalidFileFormat', 'emptyFile' or 'invalidHeader'
   *         when the file cannot be imported at all; nothing is stored then
   */
  importFromCsv(input: string | Uint8Array): Promise<ImportResult> {
    const run = this.queue.then(() => this.runImport(input));
    // Keep the queue moving even when this import fails
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runImport(input: string | Uint8Array): Promise<ImportResult> {
    const lines = splitLines(decodeInput(input));
    if (lines.length === 0) {
      throw new ImportError('emptyFile');
    }

    const [headerLine, ...dataLines] = lines;
    if (!hasRequiredHeaderTerms(headerLine.text)) {
      throw new ImportError('invalidHeader');
    }

    const schema = detectSchema(parseCsvLine(headerLine.text));
    const rows: NumberedRow[] = [];
    for (const line of dataLines) {
      const row = mapRow(parseCsvLine(line.text), schema);
      if (row) {
        rows.push({ lineNumber: line.lineNumber, row });
      }
    }

    try {
      return await this.stageAndSave(rows);
    } catch (error) {
      await this.store.discard();
      throw error;
    }
  }

  /**
   * Turns mapped rows into sessions, stages the new ones and saves them.
   */
  private async stageAndSave(rows: readonly NumberedRow[]): Promise<ImportResult> {
    let sessionsImported = 0;
    let drillsImported = 0;
    let duplicatesSkipped = 0;
    const errors: ImportIssue[] = [];

    // Snapshot once; sessions added below are tracked alongside it
    const existingSessions = await this.store.listAll();
    const importedSessions: PracticeSession[] = [];

    for (const group of groupRows(rows)) {
      const sessionDate = parseFlexibleDate(group.rawDate);
      if (!sessionDate) {
        errors.push(
          createImportIssue('invalidDateFormat', {
            row: group.rows[0].lineNumber,
            value: group.rawDate,
          })
        );
        continue;
      }

      const sessionNotes = emptyToNull(group.rawNotes);
      const isDuplicate = [...existingSessions, ...importedSessions].some(
        (session) =>
          isSameCalendarDay(session.date, sessionDate) && session.notes === sessionNotes
      );
      if (isDuplicate) {
        duplicatesSkipped++;
        continue;
      }

      const drills: Drill[] = [];
      for (const { row, lineNumber } of group.rows) {
        if (row.drillName.length === 0) {
          continue;
        }
        const built = this.buildDrill(row, lineNumber);
        if (built.ok) {
          drills.push(built.drill);
        } else {
          errors.push(built.issue);
        }
      }

      const session: PracticeSession = {
        id: generateSessionId(),
        date: sessionDate,
        notes: sessionNotes,
        drills,
        ...conditionsFromRow(group.rows[0].row),
      };

      await this.store.add(session);
      importedSessions.push(session);
      sessionsImported++;
      drillsImported += drills.length;
    }

    await this.store.save();

    return Object.freeze({
      sessionsImported,
      drillsImported,
      duplicatesSkipped,
      errors: Object.freeze(errors),
    });
  }

  /**
   * Build a drill from one row.
   *
   * The scoring type is inferred: a row with an integer in either score
   * column is a scored drill, anything else is a completion drill whose
   * status comes from the success rate column.
   */
  private buildDrill(row: CsvRow, lineNumber: number): DrillBuildResult {
    const category = categoryFromDisplayName(row.category);
    if (!category) {
      return {
        ok: false,
        issue: createImportIssue('unknownCategory', { row: lineNumber, value: row.category }),
      };
    }

    const maxScore = parseInteger(row.maxScore);
    const actualScore = parseInteger(row.actualScore);
    const isScored = maxScore !== null || actualScore !== null;

    return {
      ok: true,
      drill: {
        id: generateDrillId(),
        name: row.drillName,
        description: row.drillDescription.length > 0 ? row.drillDescription : row.drillName,
        category,
        scoringType: isScored ? 'scored' : 'completion',
        maxScore,
        actualScore,
        isCompleted: isScored ? null : row.successRate.length > 0 && row.successRate !== '0%',
        notes: emptyToNull(row.drillNotes),
        completedAt: parseFlexibleDate(row.completedAt) ?? this.clock(),
      },
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Decode file bytes as UTF-8, rejecting anything that is not valid UTF-8.
 * A leading byte order mark is dropped.
 */
function decodeInput(input: string | Uint8Array): string {
  if (typeof input === 'string') {
    return input.replace(/^\uFEFF/, '');
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch {
    throw new ImportError('invalidFileFormat');
  }
}

/**
 * Split on any line ending and drop empty lines. Line numbers count the
 * dropped lines too.
 */
function splitLines(text: string): SourceLine[] {
  return text
    .split(/\r\n|\n|\r/)
    .map((line, index) => ({ text: line, lineNumber: index + 1 }))
    .filter((line) => line.text.length > 0);
}

/**
 * Group rows by their raw session date and notes, keeping the order in
 * which each session first appears.
 */
function groupRows(rows: readonly NumberedRow[]): SessionGroup[] {
  const groups = new Map<string, SessionGroup>();

  for (const numbered of rows) {
    const { sessionDate, sessionNotes } = numbered.row;
    // The separator cannot appear in a single CSV line
    const key = `${sessionDate}\n${sessionNotes}`;
    const group = groups.get(key);
    if (group) {
      group.rows.push(numbered);
    } else {
      groups.set(key, { rawDate: sessionDate, rawNotes: sessionNotes, rows: [numbered] });
    }
  }

  return [...groups.values()];
}

/**
 * Session conditions from a group's first row. Unreadable numbers become null.
 */
function conditionsFromRow(row: CsvRow): SessionConditions {
  return {
    temperature: parseDecimal(row.temperature),
    weatherCondition: emptyToNull(row.weatherCondition),
    weatherDescription: emptyToNull(row.weatherDescription),
    humidity: parseInteger(row.humidity),
    feelsLikeTemperature: parseDecimal(row.feelsLike),
    windSpeed: parseDecimal(row.windSpeed),
    windDirection: parseInteger(row.windDirection),
    windDirectionText: emptyToNull(row.windDirectionText),
    locationName: emptyToNull(row.locationName),
    latitude: parseDecimal(row.locationLatitude),
    longitude: parseDecimal(row.locationLongitude),
    courseName: null,
    courseType: emptyToNull(row.locationType),
    distanceToCourse: null,
  };
}

function emptyToNull(value: string): string | null {
  return value.length === 0 ? null : value;
}

/**
 * Parse an optionally signed whole number, ignoring surrounding whitespace.
 *
 * @example
 * ```typescript
 * parseInteger(' 10 '); // 10
 * parseInteger('8.5');  // null
 * parseInteger('');     // null
 * ```
 */
function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Parse a decimal number such as '72.5', '-97.74' or '1e3'.
 */
function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}
