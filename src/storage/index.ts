/**
 * Storage Module - Barrel Export
 *
 * This file serves as the public API for the storage module: connection
 * helpers, the migration runner, table definitions and repositories.
 *
 * Usage:
 *   import { openDatabase, PracticeSessionRepository } from '@/storage';
 *   const { db } = await openDatabase('golf-practice.db');
 *   const repository = new PracticeSessionRepository(db);
 */

// Database connection helpers
export { openDatabase, createDatabase } from './db';
export type { AppDatabase, DatabaseConnection } from './db';

// Migrations
export { runMigrations } from './migrator';

// Table definitions
export { practiceSessions, drills, drillTemplates, schemaSnapshots } from './schema';
export type {
  PracticeSessionRow,
  NewPracticeSessionRow,
  DrillRow,
  NewDrillRow,
  DrillTemplateRow,
  NewDrillTemplateRow,
} from './schema';

// Repositories
export {
  PracticeSessionRepository,
  DrillTemplateRepository,
  type Repository,
  type CreatePracticeSessionInput,
  type CreateDrillInput,
} from './repositories';
