/**
 * Date Formatting and Parsing for Practice Data Transfer
 *
 * CSV exports write dates in a "medium date, short time" form such as
 * `Jan 15, 2024 at 9:30 AM`. Imports have to read that form back, and also
 * accept the handful of numeric layouts that spreadsheets tend to produce
 * when a file is edited by hand.
 *
 * All formatting and parsing happens in the process's local time zone, the
 * same zone the golfer saw when the session was logged.
 */

const MONTH_ABBREVIATIONS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats a date as `MMM d, yyyy at h:mm AM`.
 *
 * @example
 * ```typescript
 * formatMediumDateTime(new Date(2024, 0, 15, 9, 30)); // 'Jan 15, 2024 at 9:30 AM'
 * formatMediumDateTime(new Date(2024, 0, 20, 0, 5));  // 'Jan 20, 2024 at 12:05 AM'
 * ```
 */
export function formatMediumDateTime(date: Date): string {
  const month = MONTH_ABBREVIATIONS[date.getMonth()];
  const hours24 = date.getHours();
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  const period = hours24 < 12 ? 'AM' : 'PM';

  return `${month} ${date.getDate()}, ${date.getFullYear()} at ${hours12}:${pad2(date.getMinutes())} ${period}`;
}

/**
 * Formats a date as `yyyy-MM-dd_HH-mm`, the timestamp used in export file names.
 */
export function formatFileTimestamp(date: Date): string {
  return [
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`,
    `${pad2(date.getHours())}-${pad2(date.getMinutes())}`,
  ].join('_');
}

/**
 * Whether two dates fall on the same local calendar day.
 */
export function isSameCalendarDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Builds a local Date from calendar components, rejecting overflow such as
 * February 30th or minute 75 instead of letting Date roll it forward.
 */
function buildLocalDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date | null {
  if (month < 1 || month > 12 || day < 1 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * A single candidate layout. Returns null when the text does not match.
 */
type DateParser = (text: string) => Date | null;

const MEDIUM_DATE_TIME = /^([A-Za-z]{3})\s+(\d{1,2}),\s*(\d{4})(?:\s+at\s+|,\s*)(\d{1,2}):(\d{2})\s*([AaPp][Mm])$/;
const ISO_DATE_TIME = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{2}):(\d{2})$/;
const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const SLASHED_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const SLASHED_YEAR_FIRST = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

const parseMediumDateTime: DateParser = (text) => {
  const match = MEDIUM_DATE_TIME.exec(text);
  if (!match) return null;

  const [, monthName, day, year, hour, minute, period] = match;
  const monthIndex = MONTH_ABBREVIATIONS.findIndex(
    (abbreviation) => abbreviation.toLowerCase() === monthName.toLowerCase()
  );
  const hour12 = Number(hour);
  if (monthIndex === -1 || hour12 < 1 || hour12 > 12) return null;

  const isPm = period.toUpperCase() === 'PM';
  const hour24 = (hour12 % 12) + (isPm ? 12 : 0);
  return buildLocalDate(Number(year), monthIndex + 1, Number(day), hour24, Number(minute));
};

const parseIsoDateTime: DateParser = (text) => {
  const match = ISO_DATE_TIME.exec(text);
  if (!match) return null;
  const [, year, month, day, hours, minutes, seconds] = match;
  return buildLocalDate(
    Number(year),
    Number(month),
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds)
  );
};

const parseIsoDate: DateParser = (text) => {
  const match = ISO_DATE.exec(text);
  if (!match) return null;
  const [, year, month, day] = match;
  return buildLocalDate(Number(year), Number(month), Number(day));
};

const parseMonthFirst: DateParser = (text) => {
  const match = SLASHED_DATE.exec(text);
  if (!match) return null;
  const [, month, day, year] = match;
  return buildLocalDate(Number(year), Number(month), Number(day));
};

const parseDayFirst: DateParser = (text) => {
  const match = SLASHED_DATE.exec(text);
  if (!match) return null;
  const [, day, month, year] = match;
  return buildLocalDate(Number(year), Number(month), Number(day));
};

const parseYearFirstSlashed: DateParser = (text) => {
  const match = SLASHED_YEAR_FIRST.exec(text);
  if (!match) return null;
  const [, year, month, day] = match;
  return buildLocalDate(Number(year), Number(month), Number(day));
};

/**
 * Candidate layouts in priority order. The order matters: "01/02/2024" is
 * read month-first (January 2nd) because that parser runs before the
 * day-first one, which only gets a chance at strings like "15/01/2024".
 */
const DATE_PARSERS: readonly DateParser[] = [
  parseMediumDateTime,
  parseIsoDateTime,
  parseIsoDate,
  parseMonthFirst,
  parseDayFirst,
  parseYearFirstSlashed,
];

/**
 * Parses a date written in any of the supported layouts.
 *
 * Layouts, tried in order:
 * 1. `Jan 15, 2024 at 9:30 AM` (also `Jan 15, 2024, 9:30 AM`)
 * 2. `2024-01-15 09:30:00`
 * 3. `2024-01-15`
 * 4. `01/15/2024` (month first)
 * 5. `15/01/2024` (day first)
 * 6. `2024/01/15`
 *
 * @returns The parsed local date, or null when no layout matches
 */
export function parseFlexibleDate(text: string): Date | null {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return null;
  }

  for (const parse of DATE_PARSERS) {
    const date = parse(trimmed);
    if (date) {
      return date;
    }
  }
  return null;
}
