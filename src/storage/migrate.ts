/**
 * Database Migration Script for the Golf Practice Log
 *
 * Brings the configured database up to the schema in ./schema.ts.
 *
 * Usage:
 *   npm run db:migrate                               # Uses DATABASE_PATH or the default
 *   DATABASE_PATH=/path/to/db npm run db:migrate     # Custom database path
 *
 * The applied schema is recorded in __schema_snapshots, so running this
 * script multiple times is safe.
 */

import Database from 'better-sqlite3';
import { getDatabasePath } from '../config';
import { createDatabase } from './db';
import { runMigrations } from './migrator';

async function main(): Promise<void> {
  const dbPath = getDatabasePath();
  console.log(`[migrate] Database path: ${dbPath}`);

  const sqlite = new Database(dbPath);
  sqlite.pragma('foreign_keys = ON');

  try {
    const statements = await runMigrations({ db: createDatabase(sqlite), sqlite });

    if (statements.length === 0) {
      console.log('[migrate] Database is up to date.');
    } else {
      for (const statement of statements) {
        console.log(`[migrate] ${statement.trim()}`);
      }
      console.log(`[migrate] Applied ${statements.length} statement(s).`);
    }

    const tables = sqlite
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name NOT LIKE '\\_\\_%' ESCAPE '\\' ORDER BY name"
      )
      .all();

    console.log('[migrate] Tables in database:');
    for (const table of tables) {
      console.log(`  - ${table.name}`);
    }
  } finally {
    sqlite.close();
  }
}

main().catch((error: unknown) => {
  console.error('[migrate] Migration failed:', error);
  process.exitCode = 1;
});
