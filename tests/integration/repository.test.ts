/**
 * Integration Tests: Practice Session Repository
 *
 * Runs the repository against an in-memory SQLite database migrated to
 * the current schema:
 * - Sessions round-trip with their drills and conditions
 * - Listing order
 * - Cascade deletion of drills
 * - The staged add/save path the importer uses
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestContext, cleanupTestDatabase, type TestContext } from '../setup';
import {
  buildCompletionDrill,
  buildScoredDrill,
  buildSession,
  createTestSession,
  toCreateInput,
} from '../helpers';
import {
  DrillTemplateRepository,
  openDatabase,
  runMigrations,
  schemaSnapshots,
} from '../../src/storage';
import type { DrillTemplate } from '../../src/core/templates';

describe('PracticeSessionRepository', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  describe('create and findById', () => {
    it('should store a session with its drills and conditions', async () => {
      // Arrange
      const session = buildSession({
        temperature: 72.5,
        weatherCondition: 'Clear',
        humidity: 40,
        windDirection: 90,
        windDirectionText: 'E',
        courseName: 'Pebble Creek',
        distanceToCourse: 3.2,
        drills: [buildScoredDrill(), buildCompletionDrill({ isCompleted: false })],
      });

      // Act
      await ctx.repository.create(toCreateInput(session));
      const found = await ctx.repository.findById(session.id);

      // Assert
      expect(found).toEqual(session);
    });

    it('should keep drills in the order they were logged', async () => {
      const session = await createTestSession(ctx.repository, {
        drills: [
          buildScoredDrill({ name: 'Third' }),
          buildScoredDrill({ name: 'First' }),
          buildScoredDrill({ name: 'Second' }),
        ],
      });

      const found = await ctx.repository.findById(session.id);

      expect(found?.drills.map((drill) => drill.name)).toEqual(['Third', 'First', 'Second']);
    });

    it('should generate ids when none are given', async () => {
      const { id: _sessionId, ...fields } = buildSession();
      const { id: _drillId, ...drill } = buildScoredDrill();

      const created = await ctx.repository.create({ ...fields, drills: [drill] });

      expect(created.id.startsWith('ps_')).toBe(true);
      expect(created.drills[0].id.startsWith('drl_')).toBe(true);
      expect(await ctx.repository.findById(created.id)).toEqual(created);
    });

    it('should return null for an unknown id', async () => {
      expect(await ctx.repository.findById('ps_missing')).toBeNull();
    });
  });

  describe('findAll', () => {
    it('should list sessions newest first with their drills', async () => {
      const older = await createTestSession(ctx.repository, {
        notes: 'older',
        date: new Date(2024, 0, 10, 9, 0),
        drills: [buildScoredDrill()],
      });
      await createTestSession(ctx.repository, {
        notes: 'newer',
        date: new Date(2024, 0, 20, 9, 0),
      });

      const sessions = await ctx.repository.findAll();

      expect(sessions.map((session) => session.notes)).toEqual(['newer', 'older']);
      expect(sessions[0].drills).toEqual([]);
      expect(sessions[1].drills).toEqual(older.drills);
    });

    it('should return an empty list for an empty database', async () => {
      expect(await ctx.repository.findAll()).toEqual([]);
    });

    it('should count stored sessions', async () => {
      expect(await ctx.repository.count()).toBe(0);

      await createTestSession(ctx.repository);
      await createTestSession(ctx.repository, { notes: 'Evening' });

      expect(await ctx.repository.count()).toBe(2);
    });
  });

  describe('delete', () => {
    it('should remove the session and its drills', async () => {
      const session = await createTestSession(ctx.repository, {
        drills: [buildScoredDrill(), buildCompletionDrill()],
      });

      await ctx.repository.delete(session.id);

      expect(await ctx.repository.findById(session.id)).toBeNull();
      const remaining = ctx.sqlite.prepare('SELECT COUNT(*) AS count FROM drills').get();
      expect(remaining).toEqual({ count: 0 });
    });

    it('should throw for an unknown id', async () => {
      await expect(ctx.repository.delete('ps_missing')).rejects.toThrow(
        "Practice session with id 'ps_missing' not found"
      );
    });
  });

  describe('add and save', () => {
    it('should write nothing until save is called', async () => {
      const session = buildSession({ drills: [buildScoredDrill()] });

      await ctx.repository.add(session);
      expect(await ctx.repository.listAll()).toEqual([]);

      await ctx.repository.save();
      expect(await ctx.repository.listAll()).toEqual([session]);
    });

    it('should write every staged session once', async () => {
      await ctx.repository.add(buildSession({ notes: 'a', date: new Date(2024, 0, 1) }));
      await ctx.repository.add(buildSession({ notes: 'b', date: new Date(2024, 0, 2) }));

      await ctx.repository.save();
      await ctx.repository.save();

      const sessions = await ctx.repository.listAll();
      expect(sessions.map((session) => session.notes)).toEqual(['b', 'a']);
    });

    it('should roll back the whole batch when one insert fails', async () => {
      const existing = await createTestSession(ctx.repository, { notes: 'existing' });

      await ctx.repository.add(buildSession({ notes: 'fresh' }));
      await ctx.repository.add(buildSession({ id: existing.id, notes: 'clash' }));

      await expect(ctx.repository.save()).rejects.toThrow();

      const sessions = await ctx.repository.listAll();
      expect(sessions.map((session) => session.notes)).toEqual(['existing']);
    });

    it('should leave nothing staged after a failed save', async () => {
      const existing = await createTestSession(ctx.repository, { notes: 'existing' });
      await ctx.repository.add(buildSession({ notes: 'fresh', date: new Date(2024, 0, 5) }));
      await ctx.repository.add(buildSession({ id: existing.id, notes: 'clash' }));
      await expect(ctx.repository.save()).rejects.toThrow();

      await ctx.repository.add(buildSession({ notes: 'later', date: new Date(2024, 0, 6) }));
      await ctx.repository.save();

      const sessions = await ctx.repository.listAll();
      expect(sessions.map((session) => session.notes).sort()).toEqual(['existing', 'later']);
    });

    it('should drop staged sessions on discard', async () => {
      await ctx.repository.add(buildSession({ notes: 'dropped' }));

      await ctx.repository.discard();
      await ctx.repository.save();

      expect(await ctx.repository.count()).toBe(0);
    });
  });

  describe('migrations', () => {
    it('should not change a database that is already current', async () => {
      expect(await runMigrations({ db: ctx.db, sqlite: ctx.sqlite })).toEqual([]);
    });

    it('should record one schema snapshot for a fresh database', () => {
      const rows = ctx.db.select().from(schemaSnapshots).all();

      expect(rows).toHaveLength(1);
      expect(JSON.parse(rows[0].snapshot)).toMatchObject({
        dialect: 'sqlite',
        tables: {
          practice_sessions: { name: 'practice_sessions' },
          drills: { name: 'drills' },
          drill_templates: { name: 'drill_templates' },
        },
      });
    });

    it('should create every table on a new database', async () => {
      const connection = await openDatabase(':memory:');
      const tables = connection.sqlite
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
        )
        .all()
        .map((row) => row.name);
      connection.sqlite.close();

      expect(tables).toEqual(['__schema_snapshots', 'drill_templates', 'drills', 'practice_sessions']);
    });
  });
});

describe('DrillTemplateRepository', () => {
  let ctx: TestContext;
  let repository: DrillTemplateRepository;

  const custom: DrillTemplate = {
    id: 'tpl_custom_flop',
    name: 'Flop shots',
    description: 'Over a bag onto the fringe',
    category: 'chipping',
    scoringType: 'scored',
    defaultMaxScore: 8,
    isDefault: false,
  };

  beforeEach(async () => {
    ctx = await createTestContext();
    repository = new DrillTemplateRepository(ctx.db);
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  it('should store and list templates ordered by name', async () => {
    await repository.put({ template: custom, isDeleted: false });
    await repository.put({
      template: { ...custom, id: 'tpl_custom_bump', name: 'Bump and run' },
      isDeleted: false,
    });

    const stored = await repository.listStored();

    expect(stored.map((entry) => entry.template.name)).toEqual(['Bump and run', 'Flop shots']);
    expect(stored[1]).toEqual({ template: custom, isDeleted: false });
  });

  it('should replace the entry for an existing id', async () => {
    await repository.put({ template: custom, isDeleted: false });
    await repository.put({ template: { ...custom, defaultMaxScore: 12 }, isDeleted: true });

    const stored = await repository.listStored();

    expect(stored).toEqual([{ template: { ...custom, defaultMaxScore: 12 }, isDeleted: true }]);
  });

  it('should remove one entry and clear them all', async () => {
    await repository.put({ template: custom, isDeleted: false });
    await repository.put({
      template: { ...custom, id: 'tpl_custom_bump', name: 'Bump and run' },
      isDeleted: false,
    });

    await repository.remove('tpl_custom_flop');
    const remaining = await repository.listStored();
    expect(remaining.map((entry) => entry.template.id)).toEqual(['tpl_custom_bump']);

    await repository.clear();
    expect(await repository.listStored()).toEqual([]);
  });
});
