/**
 * Database Connection Factory for the Golf Practice Log
 *
 * This module opens SQLite databases through better-sqlite3 and wraps them
 * with Drizzle ORM. Connections are created with foreign key enforcement
 * enabled and the schema migrated to the latest version.
 *
 * Usage:
 *   import { openDatabase } from '@/storage/db';
 *   const { db, sqlite } = await openDatabase('golf-practice.db');
 *
 *   // In-memory for tests
 *   const { db } = await openDatabase(':memory:');
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { runMigrations } from './migrator';
import * as schema from './schema';

/**
 * Type alias for the Drizzle database instance.
 *
 * Use this type when you need to pass the database as a parameter.
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * An open database: the Drizzle wrapper plus the raw connection it wraps.
 */
export interface DatabaseConnection {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Wraps an existing SQLite connection with Drizzle ORM.
 */
export function createDatabase(sqlite: Database.Database): AppDatabase {
  return drizzle(sqlite, { schema });
}

/**
 * Opens (or creates) the database at the given path and brings its schema
 * up to date.
 *
 * SQLite ships with foreign keys off; they are switched on here so that
 * deleting a session removes its drills.
 *
 * @param dbPath - Path to the SQLite file, or ':memory:'
 *
 * @example
 * const { db, sqlite } = await openDatabase(':memory:');
 * // ...
 * sqlite.close();
 */
export async function openDatabase(dbPath: string): Promise<DatabaseConnection> {
  const sqlite = new Database(dbPath);
  sqlite.pragma('foreign_keys = ON');
  const connection: DatabaseConnection = { db: createDatabase(sqlite), sqlite };

  try {
    await runMigrations(connection);
  } catch (error) {
    sqlite.close();
    throw error;
  }

  return connection;
}
