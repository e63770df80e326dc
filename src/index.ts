/**
 * Golf Practice Log - Server Entry Point
 *
 * Opens the database (applying pending migrations), wires the services and
 * starts the HTTP API.
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT, HOST, NODE_ENV, DATABASE_PATH, MAX_IMPORT_BYTES, ALLOWED_ORIGINS
 *   (see src/config.ts)
 *
 * For CLI usage, see src/cli/index.ts
 */

import { config, isProduction, validateConfig } from './config';
import { createApp, startServer } from './api';
import { ExportService } from './core/export';
import { ImportService } from './core/import';
import { PracticeLogService } from './core/practice';
import { DrillTemplateService } from './core/templates';
import { DrillTemplateRepository, openDatabase, PracticeSessionRepository } from './storage';

async function main(): Promise<void> {
  validateConfig();

  const { db, sqlite } = await openDatabase(config.database.path);
  const repository = new PracticeSessionRepository(db);
  const templateService = new DrillTemplateService(new DrillTemplateRepository(db));

  const app = createApp({
    repository,
    exportService: new ExportService(),
    importService: new ImportService(repository),
    templateService,
    practiceLog: new PracticeLogService(templateService, repository),
    maxImportBytes: config.transfer.maxImportBytes,
    allowedOrigins: config.cors.allowedOrigins,
    isProduction: isProduction(),
  });

  const server = await startServer(app, {
    preferredPort: config.server.port,
    hostname: config.server.host,
    environment: config.server.nodeEnv,
  });
  server.on('close', () => sqlite.close());
}

main().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
