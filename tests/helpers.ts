/**
 * Test Helpers Module
 *
 * Factories for practice sessions and drills, in-memory session and
 * template stores, and small response helpers. Factories take partial overrides so each
 * test states only the fields it cares about.
 */

import { emptyConditions, type Drill, type PracticeSession } from '../src/core/models';
import type { SessionStore } from '../src/core/import';
import type { StoredTemplate, TemplateStore } from '../src/core/templates';
import type { CreatePracticeSessionInput, PracticeSessionRepository } from '../src/storage';

// ============================================================================
// Date Utilities
// ============================================================================

/**
 * Creates a date by subtracting days from `from`, keeping its time of day.
 */
export function daysAgo(days: number, from: Date): Date {
  const date = new Date(from);
  date.setDate(date.getDate() - days);
  return date;
}

// ============================================================================
// Domain Factories
// ============================================================================

let idCounter = 0;

function nextId(prefix: string): string {
  idCounter += 1;
  return `${prefix}_test_${idCounter}`;
}

/**
 * Builds a scored drill: 7 of 10 putts, logged 15 January 2024 at 09:45.
 */
export function buildScoredDrill(overrides: Partial<Drill> = {}): Drill {
  return {
    id: nextId('drl'),
    name: 'Three-foot putts',
    description: 'Ten putts from three feet',
    category: 'putting',
    scoringType: 'scored',
    maxScore: 10,
    actualScore: 7,
    isCompleted: null,
    notes: null,
    completedAt: new Date(2024, 0, 15, 9, 45),
    ...overrides,
  };
}

/**
 * Builds a completed completion drill.
 */
export function buildCompletionDrill(overrides: Partial<Drill> = {}): Drill {
  return {
    id: nextId('drl'),
    name: 'Bunker routine',
    description: 'Full pre-shot routine from the practice bunker',
    category: 'chipping',
    scoringType: 'completion',
    maxScore: null,
    actualScore: null,
    isCompleted: true,
    notes: null,
    completedAt: new Date(2024, 0, 15, 10, 0),
    ...overrides,
  };
}

/**
 * Builds a session on 15 January 2024 at 09:30 with no drills and no
 * conditions.
 */
export function buildSession(overrides: Partial<PracticeSession> = {}): PracticeSession {
  return {
    id: nextId('ps'),
    date: new Date(2024, 0, 15, 9, 30),
    notes: 'Morning practice',
    drills: [],
    ...emptyConditions(),
    ...overrides,
  };
}

/**
 * Builds repository input from a session (ids kept).
 */
export function toCreateInput(session: PracticeSession): CreatePracticeSessionInput {
  return { ...session };
}

/**
 * Stores a session through the repository and returns what was stored.
 */
export async function createTestSession(
  repository: PracticeSessionRepository,
  overrides: Partial<PracticeSession> = {}
): Promise<PracticeSession> {
  return repository.create(toCreateInput(buildSession(overrides)));
}

// ============================================================================
// In-memory SessionStore
// ============================================================================

/**
 * SessionStore kept in arrays. Records how often each method ran.
 */
export class InMemorySessionStore implements SessionStore {
  readonly saved: PracticeSession[];
  readonly staged: PracticeSession[] = [];
  listAllCalls = 0;
  saveCalls = 0;
  discardCalls = 0;

  constructor(initial: PracticeSession[] = []) {
    this.saved = [...initial];
  }

  async listAll(): Promise<PracticeSession[]> {
    this.listAllCalls += 1;
    return [...this.saved];
  }

  async add(session: PracticeSession): Promise<void> {
    this.staged.push(session);
  }

  async save(): Promise<void> {
    this.saveCalls += 1;
    this.saved.push(...this.staged);
    this.staged.length = 0;
  }

  async discard(): Promise<void> {
    this.discardCalls += 1;
    this.staged.length = 0;
  }
}

// ============================================================================
// In-memory TemplateStore
// ============================================================================

/**
 * TemplateStore backed by a Map, listing custom entries by name like the
 * real repository.
 */
export class InMemoryTemplateStore implements TemplateStore {
  readonly entries = new Map<string, StoredTemplate>();

  async listStored(): Promise<StoredTemplate[]> {
    return [...this.entries.values()].sort((a, b) =>
      a.template.name.localeCompare(b.template.name)
    );
  }

  async put(entry: StoredTemplate): Promise<void> {
    this.entries.set(entry.template.id, entry);
  }

  async remove(id: string): Promise<void> {
    this.entries.delete(id);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

// ============================================================================
// Response Helpers
// ============================================================================

/**
 * Parses a JSON response body.
 */
export async function getJsonResponse<T>(response: Response): Promise<T> {
  return JSON.parse(await response.text());
}

/**
 * Builds CSV text from lines, each terminated by `\n`.
 */
export function csv(...lines: string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}
