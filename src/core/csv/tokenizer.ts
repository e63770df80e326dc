/**
 * CSV Line Tokenizer
 *
 * Splits a single line of CSV text into its field values. The rules are the
 * ones every spreadsheet program writes:
 *
 * - fields are separated by commas
 * - a field may be wrapped in double quotes
 * - inside a quoted field, `""` stands for one literal quote character
 * - a comma inside a quoted field is part of the value
 *
 * Malformed quoting never throws; the tokenizer keeps whatever it has read.
 * Callers are expected to validate field counts themselves.
 *
 * @example
 * ```typescript
 * parseCsvLine('"Jan 15, 2024 at 9:30 AM","Said ""hi""",,Putting');
 * // ['Jan 15, 2024 at 9:30 AM', 'Said "hi"', '', 'Putting']
 * ```
 */

const QUOTE = '"';
const SEPARATOR = ',';

/**
 * Tokenizes one CSV line (which must not contain a line break).
 *
 * @param line - The raw line text
 * @returns Field values with surrounding quotes removed and escaped quotes collapsed
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let currentField = '';
  let insideQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === QUOTE) {
      if (insideQuotes && line[i + 1] === QUOTE) {
        // Escaped quote inside a quoted field
        currentField += QUOTE;
        i++;
      } else {
        insideQuotes = !insideQuotes;
      }
    } else if (char === SEPARATOR && !insideQuotes) {
      fields.push(currentField);
      currentField = '';
    } else {
      currentField += char;
    }
  }

  fields.push(currentField);
  return fields;
}

/**
 * Quotes a value for CSV output, doubling any quotes it contains.
 * Null and undefined become an empty quoted field.
 *
 * @example
 * ```typescript
 * escapeCsvField('3" putt'); // '"3"" putt"'
 * escapeCsvField(null);      // '""'
 * ```
 */
export function escapeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '""';
  }
  return `"${String(value).replace(/"/g, '""')}"`;
}
