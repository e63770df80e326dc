/**
 * Import Summary Tests
 */

import { describe, it, expect } from 'vitest';
import { createImportIssue, summarizeImportResult } from '../../src/core/import';

describe('summarizeImportResult', () => {
  it('lists each non-zero count with singular and plural nouns', () => {
    expect(
      summarizeImportResult({
        sessionsImported: 1,
        drillsImported: 3,
        duplicatesSkipped: 2,
        errors: [createImportIssue('unknownCategory', { row: 4, value: 'Bunker' })],
      })
    ).toBe('1 session imported\n3 drills imported\n2 duplicates skipped\n1 error encountered');
  });

  it('reports when nothing new was imported', () => {
    expect(
      summarizeImportResult({
        sessionsImported: 0,
        drillsImported: 0,
        duplicatesSkipped: 1,
        errors: [],
      })
    ).toBe('1 duplicate skipped\nNo new data was imported');
  });

  it('counts a session without drills as new data', () => {
    expect(
      summarizeImportResult({
        sessionsImported: 2,
        drillsImported: 0,
        duplicatesSkipped: 0,
        errors: [],
      })
    ).toBe('2 sessions imported');
  });
});

describe('createImportIssue', () => {
  it('fills in the standard message and omits absent context', () => {
    expect(createImportIssue('invalidDateFormat')).toEqual({
      kind: 'invalidDateFormat',
      message: 'Invalid date format in CSV file.',
    });
    expect(createImportIssue('unknownCategory', { row: 3, value: 'Bunker' })).toEqual({
      kind: 'unknownCategory',
      message: 'Unknown drill category found in CSV file.',
      row: 3,
      value: 'Bunker',
    });
  });
});
