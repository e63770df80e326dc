/**
 * CSV Column Schema for Practice Data
 *
 * Practice data has been exported in two layouts over time:
 *
 * - the legacy layout, 10 columns with session date/notes and drill fields
 * - the extended layout, 22 columns that add weather, wind and location
 *   fields between the session notes and the drill name
 *
 * Imports accept both. Columns are located by header name rather than by
 * position, so a file whose header uses either layout (or reorders columns)
 * maps onto the same flat {@link CsvRow}.
 */

/**
 * One data line of a practice CSV, with every column as raw text.
 * Columns missing from the file's layout are empty strings.
 */
export interface CsvRow {
  sessionDate: string;
  sessionNotes: string;
  temperature: string;
  weatherCondition: string;
  weatherDescription: string;
  humidity: string;
  feelsLike: string;
  windSpeed: string;
  windDirection: string;
  windDirectionText: string;
  locationName: string;
  locationType: string;
  locationLatitude: string;
  locationLongitude: string;
  drillName: string;
  drillDescription: string;
  category: string;
  maxScore: string;
  actualScore: string;
  successRate: string;
  drillNotes: string;
  completedAt: string;
}

export type CsvColumnKey = keyof CsvRow;

interface ColumnDefinition {
  key: CsvColumnKey;
  header: string;
}

/**
 * The extended layout, in the exact order exports write it.
 */
export const EXTENDED_COLUMNS: readonly ColumnDefinition[] = [
  { key: 'sessionDate', header: 'Session Date' },
  { key: 'sessionNotes', header: 'Session Notes' },
  { key: 'temperature', header: 'Temperature' },
  { key: 'weatherCondition', header: 'Weather Condition' },
  { key: 'weatherDescription', header: 'Weather Description' },
  { key: 'humidity', header: 'Humidity' },
  { key: 'feelsLike', header: 'Feels Like' },
  { key: 'windSpeed', header: 'Wind Speed' },
  { key: 'windDirection', header: 'Wind Direction' },
  { key: 'windDirectionText', header: 'Wind Direction Text' },
  { key: 'locationName', header: 'Location Name' },
  { key: 'locationType', header: 'Location Type' },
  { key: 'locationLatitude', header: 'Location Latitude' },
  { key: 'locationLongitude', header: 'Location Longitude' },
  { key: 'drillName', header: 'Drill Name' },
  { key: 'drillDescription', header: 'Drill Description' },
  { key: 'category', header: 'Category' },
  { key: 'maxScore', header: 'Max Score' },
  { key: 'actualScore', header: 'Actual Score' },
  { key: 'successRate', header: 'Success Rate' },
  { key: 'drillNotes', header: 'Drill Notes' },
  { key: 'completedAt', header: 'Completed At' },
];

/**
 * The legacy layout written before conditions were captured.
 */
export const LEGACY_COLUMNS: readonly ColumnDefinition[] = EXTENDED_COLUMNS.filter(
  (column) =>
    [
      'sessionDate',
      'sessionNotes',
      'drillName',
      'drillDescription',
      'category',
      'maxScore',
      'actualScore',
      'successRate',
      'drillNotes',
      'completedAt',
    ].includes(column.key)
);

/**
 * Header line written by CSV exports.
 */
export const EXTENDED_HEADER = EXTENDED_COLUMNS.map((column) => column.header).join(',');

/**
 * Substrings a header must contain (case-insensitively) to be accepted.
 */
export const REQUIRED_HEADER_TERMS = ['session date', 'drill name', 'category'] as const;

/**
 * How the columns of a particular file map onto {@link CsvRow}.
 */
export interface CsvSchema {
  /** 'extended' when every extended column is present, 'legacy' otherwise */
  kind: 'extended' | 'legacy';
  /** Minimum number of fields a data line needs to be used */
  width: number;
  /** Field index of each column found in the header */
  positions: Partial<Record<CsvColumnKey, number>>;
}

function normalizeHeaderName(name: string): string {
  return name.replace(/"/g, '').trim().toLowerCase();
}

/**
 * Whether a header line names the columns an import cannot do without.
 */
export function hasRequiredHeaderTerms(headerLine: string): boolean {
  const normalized = headerLine.replace(/"/g, '').toLowerCase();
  return REQUIRED_HEADER_TERMS.every((term) => normalized.includes(term));
}

/**
 * Works out the layout of a file from its tokenized header.
 *
 * Extended files must have all 22 fields on every data line. Any other
 * header is treated as legacy, where a data line needs as many fields as
 * the header has names.
 *
 * @example
 * ```typescript
 * detectSchema(parseCsvLine(EXTENDED_HEADER)).kind; // 'extended'
 * detectSchema(['Session Date', 'Session Notes', 'Drill Name', 'Category']).width; // 4
 * ```
 */
export function detectSchema(headerFields: readonly string[]): CsvSchema {
  const indexByName = new Map<string, number>();
  headerFields.forEach((name, index) => {
    const normalized = normalizeHeaderName(name);
    // First occurrence wins when a header repeats a name
    if (!indexByName.has(normalized)) {
      indexByName.set(normalized, index);
    }
  });

  const positions: Partial<Record<CsvColumnKey, number>> = {};
  for (const column of EXTENDED_COLUMNS) {
    const index = indexByName.get(column.header.toLowerCase());
    if (index !== undefined) {
      positions[column.key] = index;
    }
  }

  const isExtended = EXTENDED_COLUMNS.every((column) => positions[column.key] !== undefined);

  return isExtended
    ? { kind: 'extended', width: EXTENDED_COLUMNS.length, positions }
    : { kind: 'legacy', width: headerFields.length, positions };
}

/**
 * Maps the fields of one data line onto a {@link CsvRow}.
 *
 * @returns The row, or null when the line is narrower than the schema
 */
export function mapRow(fields: readonly string[], schema: CsvSchema): CsvRow | null {
  if (fields.length < schema.width) {
    return null;
  }

  const read = (key: CsvColumnKey): string => {
    const position = schema.positions[key];
    return position === undefined ? '' : fields[position] ?? '';
  };

  return {
    sessionDate: read('sessionDate'),
    sessionNotes: read('sessionNotes'),
    temperature: read('temperature'),
    weatherCondition: read('weatherCondition'),
    weatherDescription: read('weatherDescription'),
    humidity: read('humidity'),
    feelsLike: read('feelsLike'),
    windSpeed: read('windSpeed'),
    windDirection: read('windDirection'),
    windDirectionText: read('windDirectionText'),
    locationName: read('locationName'),
    locationType: read('locationType'),
    locationLatitude: read('locationLatitude'),
    locationLongitude: read('locationLongitude'),
    drillName: read('drillName'),
    drillDescription: read('drillDescription'),
    category: read('category'),
    maxScore: read('maxScore'),
    actualScore: read('actualScore'),
    successRate: read('successRate'),
    drillNotes: read('drillNotes'),
    completedAt: read('completedAt'),
  };
}
