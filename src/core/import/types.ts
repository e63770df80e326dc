/**
 * Import Types
 *
 * The importer writes into whatever store the host application provides.
 * {@link SessionStore} is the narrow slice of persistence it needs, which
 * keeps the import logic testable against an in-memory fake.
 */

import type { PracticeSession } from '../models';
import type { ImportIssue } from './errors';

/**
 * Persistence the importer writes through.
 *
 * `add` may stage a session without writing it; `save` commits everything
 * staged since the last save or discard.
 */
export interface SessionStore {
  /** Every stored session, drills included */
  listAll(): Promise<PracticeSession[]>;
  /** Stage a new session for the next save */
  add(session: PracticeSession): Promise<void>;
  /** Commit staged sessions; the staging area is empty afterwards either way */
  save(): Promise<void>;
  /** Drop staged sessions without committing them */
  discard(): Promise<void>;
}

/**
 * What an import did. Frozen once returned.
 */
export interface ImportResult {
  /** Session groups created (duplicates excluded) */
  readonly sessionsImported: number;
  /** Drills attached to the created sessions */
  readonly drillsImported: number;
  /** Session groups skipped because a matching session already existed */
  readonly duplicatesSkipped: number;
  /** Recoverable problems, in the order they were found */
  readonly errors: readonly ImportIssue[];
}
