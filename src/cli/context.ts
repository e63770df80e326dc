/**
 * Shared dependencies for CLI commands.
 *
 * Commands receive a CliContext instead of opening the database
 * themselves, so tests can run them against an in-memory database.
 */

import { ExportService } from '../core/export';
import { ImportService } from '../core/import';
import { PracticeLogService } from '../core/practice';
import { DrillTemplateService } from '../core/templates';
import { DrillTemplateRepository, openDatabase, PracticeSessionRepository } from '../storage';

export interface CliContext {
  repository: PracticeSessionRepository;
  exportService: ExportService;
  importService: ImportService;
  templateService: DrillTemplateService;
  practiceLog: PracticeLogService;
  /** Current time for range filters and generated file names */
  clock: () => Date;
}

export interface OpenCliContext extends CliContext {
  /** Closes the database connection */
  close(): void;
}

/**
 * Opens the database at `dbPath` (migrating it if needed) and builds the
 * services the commands use.
 */
export async function openCliContext(dbPath: string): Promise<OpenCliContext> {
  const { db, sqlite } = await openDatabase(dbPath);
  const repository = new PracticeSessionRepository(db);
  const templateService = new DrillTemplateService(new DrillTemplateRepository(db));

  return {
    repository,
    exportService: new ExportService(),
    importService: new ImportService(repository),
    templateService,
    practiceLog: new PracticeLogService(templateService, repository),
    clock: () => new Date(),
    close: () => sqlite.close(),
  };
}
