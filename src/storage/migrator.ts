/**
 * Schema Migration Runner
 *
 * Tables are never written out by hand. drizzle-kit turns ./schema.ts into
 * a snapshot, diffs it against the snapshot the database was last migrated
 * to, and produces the DDL that closes the gap. The statements and the new
 * snapshot are applied in one transaction.
 *
 * drizzle-kit/api is loaded through require: its ESM build pulls in
 * CommonJS modules that cannot be imported from ESM.
 */

import { createRequire } from 'node:module';
import { desc } from 'drizzle-orm';
import type { DatabaseConnection } from './db';
import * as schema from './schema';

const require = createRequire(import.meta.url);
const drizzleKit: typeof import('drizzle-kit/api') = require('drizzle-kit/api');

type SchemaSnapshot = Parameters<typeof drizzleKit.generateSQLiteMigration>[0];

const SNAPSHOT_TABLE = '__schema_snapshots';

function hasSnapshotTable(connection: DatabaseConnection): boolean {
  const row = connection.sqlite
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name = ?"
    )
    .get(SNAPSHOT_TABLE);
  return row !== undefined;
}

async function loadAppliedSnapshot(connection: DatabaseConnection): Promise<SchemaSnapshot> {
  if (!hasSnapshotTable(connection)) {
    return drizzleKit.generateSQLiteDrizzleJson({});
  }

  const latest = connection.db
    .select({ snapshot: schema.schemaSnapshots.snapshot })
    .from(schema.schemaSnapshots)
    .orderBy(desc(schema.schemaSnapshots.id))
    .limit(1)
    .get();

  if (!latest) {
    return drizzleKit.generateSQLiteDrizzleJson({});
  }

  const parsed: SchemaSnapshot = JSON.parse(latest.snapshot);
  return parsed;
}

/**
 * Bring the database up to the schema defined in ./schema.ts.
 *
 * @returns The DDL statements executed by this call; empty when the
 *   database was already current
 */
export async function runMigrations(connection: DatabaseConnection): Promise<string[]> {
  const applied = await loadAppliedSnapshot(connection);
  const target = await drizzleKit.generateSQLiteDrizzleJson({ ...schema });
  const statements = await drizzleKit.generateSQLiteMigration(applied, target);

  if (statements.length === 0) {
    return [];
  }

  connection.sqlite.transaction(() => {
    for (const statement of statements) {
      connection.sqlite.exec(statement);
    }
    connection.db
      .insert(schema.schemaSnapshots)
      .values({ snapshot: JSON.stringify(target), appliedAt: new Date() })
      .run();
  })();

  return statements;
}
