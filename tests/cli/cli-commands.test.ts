/**
 * CLI Command Tests
 *
 * Runs the command handlers against an in-memory database and a temporary
 * directory, and checks option parsing and the printed output.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTestContext, cleanupTestDatabase, type TestContext } from '../setup';
import { buildScoredDrill, createTestSession, csv, daysAgo } from '../helpers';
import { EXTENDED_HEADER } from '../../src/core/csv';
import type { CliContext } from '../../src/cli/context';
import {
  createExportCommand,
  parseExportOptions,
  runExport,
} from '../../src/cli/commands/export';
import { formatIssue, runImport } from '../../src/cli/commands/import';
import { parseLimit, runSessionsList } from '../../src/cli/commands/sessions';
import {
  createLogCommand,
  parseDrillSpec,
  parseLogOptions,
  runLog,
} from '../../src/cli/commands/log';
import { formatTemplate, parseCategory, runTemplatesList } from '../../src/cli/commands/templates';
import { parseRange, runStats } from '../../src/cli/commands/stats';
import { dim, green, red, yellow } from '../../src/cli/utils/terminal';

const LEGACY_HEADER =
  'Session Date,Session Notes,Drill Name,Drill Description,Category,Max Score,Actual Score,Success Rate,Drill Notes,Completed At';

describe('CLI commands', () => {
  let ctx: TestContext;
  let cli: CliContext;
  let workDir: string;

  beforeEach(async () => {
    ctx = await createTestContext();
    cli = {
      repository: ctx.repository,
      exportService: ctx.exportService,
      importService: ctx.importService,
      templateService: ctx.templateService,
      practiceLog: ctx.practiceLog,
      clock: () => ctx.now,
    };
    workDir = await mkdtemp(join(tmpdir(), 'golf-log-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    cleanupTestDatabase(ctx);
    await rm(workDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // export
  // ==========================================================================
  describe('export', () => {
    it('should accept formats in any case', () => {
      expect(parseExportOptions({ format: 'JSON', range: 'month' })).toEqual({
        format: 'json',
        range: 'month',
        output: undefined,
      });
    });

    it('should name the accepted values for unknown options', () => {
      expect(() => parseExportOptions({ format: 'xml', range: 'all' })).toThrow(
        'Unknown format "xml". Use csv or json.'
      );
      expect(() => parseExportOptions({ format: 'csv', range: 'decade' })).toThrow(
        'Unknown range "decade". Use one of: week, month, threeMonths, sixMonths, year, all.'
      );
    });

    it('should write the sessions in range to the output file', async () => {
      // Arrange
      await createTestSession(ctx.repository, {
        notes: 'recent',
        date: daysAgo(2, ctx.now),
        drills: [buildScoredDrill()],
      });
      await createTestSession(ctx.repository, { notes: 'old', date: daysAgo(90, ctx.now) });
      const output = join(workDir, 'practice.csv');

      // Act
      const outcome = await runExport(cli, { format: 'csv', range: 'week', output });

      // Assert
      const content = await readFile(output, 'utf-8');
      expect(outcome).toEqual({
        path: output,
        sessionCount: 1,
        bytes: Buffer.byteLength(content),
      });
      const lines = content.split('\n');
      expect(lines[0]).toBe(EXTENDED_HEADER);
      expect(lines[1]).toContain('"recent"');
      expect(lines).toHaveLength(3);
      expect(console.log).toHaveBeenCalledWith(green(`  Exported to ${output}`));
    });

    it('should report bad options through the command', async () => {
      await createExportCommand(async () => cli).parseAsync(['--format', 'xml'], { from: 'user' });

      expect(console.error).toHaveBeenCalledWith(
        red('Error: Unknown format "xml". Use csv or json.')
      );
      expect(process.exitCode).toBe(1);
    });
  });

  // ==========================================================================
  // import
  // ==========================================================================
  describe('import', () => {
    it('should import the file and print the summary', async () => {
      const file = join(workDir, 'practice.csv');
      await writeFile(
        file,
        csv(
          LEGACY_HEADER,
          '"Jan 15, 2024 at 9:30 AM","Morning","Lag putts","","Putting","10","8","80.0%","","Jan 15, 2024 at 9:45 AM"'
        )
      );

      const result = await runImport(cli, file);

      expect(result.sessionsImported).toBe(1);
      expect(await ctx.repository.findAll()).toHaveLength(1);
      expect(console.log).toHaveBeenCalledWith(green('  1 session imported'));
      expect(console.log).toHaveBeenCalledWith(green('  1 drill imported'));
    });

    it('should list row problems', async () => {
      const file = join(workDir, 'practice.csv');
      await writeFile(
        file,
        csv(
          LEGACY_HEADER,
          '"Jan 15, 2024 at 9:30 AM","Morning","Sand saves","","Bunker","","","100%","",""'
        )
      );

      await runImport(cli, file);

      expect(console.log).toHaveBeenCalledWith(
        yellow('  Row 2: Unknown drill category found in CSV file. ("Bunker")')
      );
    });

    it('should fail for a missing file', async () => {
      await expect(runImport(cli, join(workDir, 'missing.csv'))).rejects.toThrow('ENOENT');
    });

    it('should format issues with and without context', () => {
      expect(
        formatIssue({ kind: 'invalidDateFormat', message: 'Invalid date format in CSV file.' })
      ).toBe('Invalid date format in CSV file.');
      expect(
        formatIssue({
          kind: 'invalidDateFormat',
          message: 'Invalid date format in CSV file.',
          row: 7,
          value: 'someday',
        })
      ).toBe('Row 7: Invalid date format in CSV file. ("someday")');
    });
  });

  // ==========================================================================
  // sessions
  // ==========================================================================
  describe('sessions', () => {
    it('should fall back to 10 for anything but a positive integer', () => {
      expect(parseLimit(undefined)).toBe(10);
      expect(parseLimit('5')).toBe(5);
      expect(parseLimit('0')).toBe(10);
      expect(parseLimit('-3')).toBe(10);
      expect(parseLimit('two')).toBe(10);
    });

    it('should list the newest sessions up to the limit', async () => {
      await createTestSession(ctx.repository, { notes: 'oldest', date: daysAgo(9, ctx.now) });
      await createTestSession(ctx.repository, { notes: 'newest', date: daysAgo(1, ctx.now) });
      await createTestSession(ctx.repository, { notes: 'middle', date: daysAgo(5, ctx.now) });

      const listed = await runSessionsList(cli, 2);

      expect(listed.map((session) => session.notes)).toEqual(['newest', 'middle']);
    });

    it('should say so when there are no sessions', async () => {
      const listed = await runSessionsList(cli, 10);

      expect(listed).toEqual([]);
      expect(console.log).toHaveBeenCalledWith(yellow('  No practice sessions found.'));
    });
  });

  // ==========================================================================
  // log
  // ==========================================================================
  describe('log', () => {
    it('should parse each form of drill result', () => {
      expect(parseDrillSpec('tpl_putting_gate=8')).toEqual({
        templateId: 'tpl_putting_gate',
        score: 8,
      });
      expect(parseDrillSpec('tpl_irons_target_green=6/12')).toEqual({
        templateId: 'tpl_irons_target_green',
        score: 6,
        maxScore: 12,
      });
      expect(parseDrillSpec('tpl_putting_lag=DONE')).toEqual({
        templateId: 'tpl_putting_lag',
        isCompleted: true,
      });
      expect(parseDrillSpec('tpl_putting_lag=missed')).toEqual({
        templateId: 'tpl_putting_lag',
        isCompleted: false,
      });
    });

    it('should reject malformed drill results', () => {
      expect(() => parseDrillSpec('tpl_putting_gate')).toThrow(
        'Invalid drill "tpl_putting_gate". Use <template-id>=<result>, e.g. tpl_putting_gate=8.'
      );
      expect(() => parseDrillSpec('tpl_putting_gate=lots')).toThrow(
        'Invalid result "lots" for tpl_putting_gate. Use a score, score/attempts, done or missed.'
      );
    });

    it('should build the session input from the options', () => {
      expect(
        parseLogOptions({ drill: ['tpl_putting_gate=8'], course: 'Eastside Driving Range' })
      ).toEqual({
        notes: null,
        drills: [{ templateId: 'tpl_putting_gate', score: 8 }],
        conditions: { courseName: 'Eastside Driving Range', locationName: null },
      });
    });

    it('should store the session and print each drill', async () => {
      const session = await runLog(
        cli,
        parseLogOptions({
          drill: ['tpl_putting_gate=8', 'tpl_putting_lag=done'],
          notes: 'Before work',
          course: 'Eastside Driving Range',
        })
      );

      const stored = await ctx.repository.findById(session.id);
      expect(stored?.notes).toBe('Before work');
      expect(stored?.courseType).toBe('Driving Range');
      expect(stored?.date).toEqual(ctx.now);
      expect(console.log).toHaveBeenCalledWith('  Gate Drill: 8/10');
      expect(console.log).toHaveBeenCalledWith('  Lag Putting: Completed');
      expect(console.log).toHaveBeenCalledWith(
        `  Eastside Driving Range ${dim('(Driving Range)')}`
      );
    });

    it('should report an unknown template through the command', async () => {
      await createLogCommand(async () => cli).parseAsync(['--drill', 'tpl_missing=3'], {
        from: 'user',
      });

      expect(console.error).toHaveBeenCalledWith(
        red("Error: No drill template with ID 'tpl_missing'")
      );
      expect(process.exitCode).toBe(1);
      expect(await ctx.repository.count()).toBe(0);
    });
  });

  // ==========================================================================
  // templates
  // ==========================================================================
  describe('templates', () => {
    it('should parse categories in any case', () => {
      expect(parseCategory(undefined)).toBeUndefined();
      expect(parseCategory('Putting')).toBe('putting');
      expect(() => parseCategory('bunker')).toThrow(
        'Unknown category "bunker". Use one of: putting, chipping, pitching, irons, driver.'
      );
    });

    it('should describe scoring and mark custom templates', () => {
      expect(
        formatTemplate({
          id: 'tpl_custom_flop',
          name: 'Flop shots',
          description: '',
          category: 'chipping',
          scoringType: 'completion',
          defaultMaxScore: 5,
          isDefault: false,
        })
      ).toBe('tpl_custom_flop  Flop shots (completion) [custom]');
    });

    it('should list one category', async () => {
      const listed = await runTemplatesList(cli, 'driver');

      expect(listed.map((template) => template.id)).toEqual([
        'tpl_driver_fairway_finder',
        'tpl_driver_tee_height',
        'tpl_driver_shape',
      ]);
      expect(console.log).toHaveBeenCalledWith(
        '    tpl_driver_fairway_finder  Fairway Finder (out of 14)'
      );
    });
  });

  // ==========================================================================
  // stats
  // ==========================================================================
  describe('stats', () => {
    it('should validate the range', () => {
      expect(parseRange('month')).toBe('month');
      expect(() => parseRange('decade')).toThrow('Unknown range "decade".');
    });

    it('should total the sessions in range', async () => {
      await createTestSession(ctx.repository, {
        date: daysAgo(3, ctx.now),
        drills: [buildScoredDrill({ maxScore: 10, actualScore: 8 }), buildScoredDrill()],
      });
      await createTestSession(ctx.repository, { date: daysAgo(300, ctx.now), drills: [] });

      const stats = await runStats(cli, 'month');

      expect(stats.totalSessions).toBe(1);
      expect(stats.categories).toEqual([
        {
          category: 'putting',
          displayName: 'Putting',
          drillCount: 2,
          successfulDrills: 2,
          successPercentage: 100,
        },
      ]);
      expect(console.log).toHaveBeenCalledWith('  Drills per session: 2.0');
    });

    it('should say so when nothing was practised', async () => {
      await runStats(cli, 'all');

      expect(console.log).toHaveBeenCalledWith(yellow('  No drills logged in this range.'));
    });
  });
});
