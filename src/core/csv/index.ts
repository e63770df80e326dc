/**
 * CSV Module - Barrel Export
 *
 * Tokenizing, escaping and column mapping shared by the exporter and importer.
 */

export { parseCsvLine, escapeCsvField } from './tokenizer';

export type { CsvRow, CsvColumnKey, CsvSchema } from './columns';
export {
  EXTENDED_COLUMNS,
  LEGACY_COLUMNS,
  EXTENDED_HEADER,
  REQUIRED_HEADER_TERMS,
  hasRequiredHeaderTerms,
  detectSchema,
  mapRow,
} from './columns';
