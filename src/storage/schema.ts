/**
 * Database Schema Definitions for the Golf Practice Log
 *
 * This file contains Drizzle ORM schema definitions for SQLite.
 *
 * The schema stores:
 * - Practice Sessions: one row per outing, with the conditions snapshot
 * - Drills: the drills logged in a session, in the order they were logged
 *
 * - Drill Templates: custom templates and edits to the built-in catalog
 * - Schema Snapshots: the schema each migration brought the database to
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 * Tables are created and altered from these definitions by ./migrator.ts.
 */

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

/**
 * Practice Sessions Table
 *
 * Condition columns are all nullable; weather and location lookups are
 * optional when a session is logged.
 */
export const practiceSessions = sqliteTable(
  'practice_sessions',
  {
    // Unique identifier (e.g. 'ps_<uuid>')
    id: text('id').primaryKey(),

    // When the session took place
    date: integer('date', { mode: 'timestamp_ms' }).notNull(),

    notes: text('notes'),

    // Weather
    temperature: real('temperature'),
    weatherCondition: text('weather_condition'),
    weatherDescription: text('weather_description'),
    humidity: integer('humidity'),
    feelsLikeTemperature: real('feels_like_temperature'),

    // Wind
    windSpeed: real('wind_speed'),
    windDirection: integer('wind_direction'),
    windDirectionText: text('wind_direction_text'),

    // Location
    locationName: text('location_name'),
    latitude: real('latitude'),
    longitude: real('longitude'),
    courseName: text('course_name'),
    courseType: text('course_type'),
    distanceToCourse: real('distance_to_course'),

    // When the row was written
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('practice_sessions_date_idx').on(table.date)]
);

/**
 * Drills Table
 *
 * Drills are owned by their session and removed with it. `position` keeps
 * the order in which they were logged.
 *
 * Scoring columns:
 * - 'scored' drills use max_score / actual_score
 * - 'completion' drills use is_completed
 */
export const drills = sqliteTable(
  'drills',
  {
    id: text('id').primaryKey(),

    // Owning session; deleting the session deletes its drills
    sessionId: text('session_id')
      .notNull()
      .references(() => practiceSessions.id, { onDelete: 'cascade' }),

    // 0-based order within the session
    position: integer('position').notNull(),

    name: text('name').notNull(),
    description: text('description').notNull(),

    category: text('category', {
      enum: ['putting', 'chipping', 'pitching', 'irons', 'driver'],
    }).notNull(),

    scoringType: text('scoring_type', { enum: ['scored', 'completion'] }).notNull(),

    maxScore: integer('max_score'),
    actualScore: integer('actual_score'),
    isCompleted: integer('is_completed', { mode: 'boolean' }),

    notes: text('notes'),

    completedAt: integer('completed_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('drills_session_id_idx').on(table.sessionId)]
);

/**
 * Drill Templates Table
 *
 * The built-in catalog ships as JSON and is never copied here. Rows are
 * either custom templates (`is_default` false) or changes to a built-in
 * template stored under its id: an edited copy, or a tombstone with
 * `is_deleted` set.
 */
export const drillTemplates = sqliteTable('drill_templates', {
  id: text('id').primaryKey(),

  name: text('name').notNull(),
  description: text('description').notNull(),

  category: text('category', {
    enum: ['putting', 'chipping', 'pitching', 'irons', 'driver'],
  }).notNull(),

  scoringType: text('scoring_type', { enum: ['scored', 'completion'] }).notNull(),
  defaultMaxScore: integer('default_max_score').notNull(),

  isDefault: integer('is_default', { mode: 'boolean' }).notNull(),
  isDeleted: integer('is_deleted', { mode: 'boolean' }).notNull().default(false),

  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Schema Snapshots Table
 *
 * One row per applied migration, holding the drizzle-kit snapshot of the
 * schema it produced. The newest row is what the next migration diffs from.
 */
export const schemaSnapshots = sqliteTable('__schema_snapshots', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  snapshot: text('snapshot').notNull(),
  appliedAt: integer('applied_at', { mode: 'timestamp_ms' }).notNull(),
});

// Type exports for practice sessions
export type PracticeSessionRow = typeof practiceSessions.$inferSelect;
export type NewPracticeSessionRow = typeof practiceSessions.$inferInsert;

// Type exports for drills
export type DrillRow = typeof drills.$inferSelect;
export type NewDrillRow = typeof drills.$inferInsert;

// Type exports for drill templates
export type DrillTemplateRow = typeof drillTemplates.$inferSelect;
export type NewDrillTemplateRow = typeof drillTemplates.$inferInsert;
