/**
 * Practice Session Repository Implementation
 *
 * This module provides data access for practice sessions and the drills
 * they own, mapping between the two tables and the nested
 * {@link PracticeSession} domain model.
 *
 * The repository is also the {@link SessionStore} the importer writes
 * through: `add` stages sessions in memory and `save` writes everything
 * staged in a single transaction.
 */

import { asc, count, desc, eq, inArray } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { drills, practiceSessions, type DrillRow, type PracticeSessionRow } from '../schema';
import {
  generateDrillId,
  generateSessionId,
  type Drill,
  type PracticeSession,
} from '@/core/models';
import type { SessionStore } from '@/core/import';
import type { Repository } from './base';

/**
 * Input type for creating a drill. The id is generated when omitted.
 */
export type CreateDrillInput = Omit<Drill, 'id'> & { id?: string };

/**
 * Input type for creating a practice session with its drills.
 * Ids are generated when omitted.
 */
export type CreatePracticeSessionInput = Omit<PracticeSession, 'id' | 'drills'> & {
  id?: string;
  drills: CreateDrillInput[];
};

/**
 * Maps a drill row to the Drill domain model.
 */
function mapDrillToDomain(row: DrillRow): Drill {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    category: row.category,
    scoringType: row.scoringType,
    maxScore: row.maxScore,
    actualScore: row.actualScore,
    isCompleted: row.isCompleted,
    notes: row.notes,
    completedAt: row.completedAt,
  };
}

/**
 * Maps a session row and its drill rows to the PracticeSession domain model.
 *
 * @param row - Raw session row
 * @param drillRows - The session's drill rows, already in position order
 */
function mapToDomain(row: PracticeSessionRow, drillRows: DrillRow[]): PracticeSession {
  return {
    id: row.id,
    date: row.date,
    notes: row.notes,
    drills: drillRows.map(mapDrillToDomain),
    temperature: row.temperature,
    weatherCondition: row.weatherCondition,
    weatherDescription: row.weatherDescription,
    humidity: row.humidity,
    feelsLikeTemperature: row.feelsLikeTemperature,
    windSpeed: row.windSpeed,
    windDirection: row.windDirection,
    windDirectionText: row.windDirectionText,
    locationName: row.locationName,
    latitude: row.latitude,
    longitude: row.longitude,
    courseName: row.courseName,
    courseType: row.courseType,
    distanceToCourse: row.distanceToCourse,
  };
}

/**
 * Repository for practice sessions and their drills.
 *
 * @example
 * ```typescript
 * const repo = new PracticeSessionRepository(db);
 *
 * const session = await repo.create({
 *   date: new Date(),
 *   notes: 'Range session',
 *   drills: [],
 *   ...emptyConditions(),
 * });
 *
 * const recent = await repo.findAll(); // newest first
 * await repo.delete(session.id);
 * ```
 */
export class PracticeSessionRepository
  implements Repository<PracticeSession, CreatePracticeSessionInput>, SessionStore
{
  /** Sessions added through {@link add} and not yet saved */
  private pending: PracticeSession[] = [];

  /**
   * Creates a new PracticeSessionRepository instance.
   *
   * @param db - The Drizzle database instance to use for queries
   */
  constructor(private readonly db: AppDatabase) {}

  /**
   * Retrieves a session with its drills.
   *
   * @returns The session if found, or null if not found
   */
  async findById(id: string): Promise<PracticeSession | null> {
    const result = await this.db
      .select()
      .from(practiceSessions)
      .where(eq(practiceSessions.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    const drillRows = await this.db
      .select()
      .from(drills)
      .where(eq(drills.sessionId, id))
      .orderBy(asc(drills.position));

    return mapToDomain(result[0], drillRows);
  }

  /**
   * Retrieves every session with its drills, newest first.
   */
  async findAll(): Promise<PracticeSession[]> {
    const sessionRows = await this.db
      .select()
      .from(practiceSessions)
      .orderBy(desc(practiceSessions.date));

    if (sessionRows.length === 0) {
      return [];
    }

    const drillRows = await this.db
      .select()
      .from(drills)
      .where(
        inArray(
          drills.sessionId,
          sessionRows.map((row) => row.id)
        )
      )
      .orderBy(asc(drills.sessionId), asc(drills.position));

    const drillsBySession = new Map<string, DrillRow[]>();
    for (const drillRow of drillRows) {
      const list = drillsBySession.get(drillRow.sessionId);
      if (list) {
        list.push(drillRow);
      } else {
        drillsBySession.set(drillRow.sessionId, [drillRow]);
      }
    }

    return sessionRows.map((row) => mapToDomain(row, drillsBySession.get(row.id) ?? []));
  }

  /**
   * Number of stored sessions.
   */
  async count(): Promise<number> {
    const [row] = await this.db.select({ total: count() }).from(practiceSessions);
    return row?.total ?? 0;
  }

  /**
   * Creates a session and its drills in one transaction.
   *
   * @returns The created session with generated ids
   */
  async create(input: CreatePracticeSessionInput): Promise<PracticeSession> {
    const session: PracticeSession = {
      ...input,
      id: input.id ?? generateSessionId(),
      drills: input.drills.map((drill) => ({ ...drill, id: drill.id ?? generateDrillId() })),
    };

    this.insertSessions([session]);
    return session;
  }

  /**
   * Permanently deletes a session. Its drills are removed with it.
   *
   * @throws Error if the session does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(practiceSessions)
      .where(eq(practiceSessions.id, id))
      .returning({ id: practiceSessions.id });

    if (result.length === 0) {
      throw new Error(`Practice session with id '${id}' not found`);
    }
  }

  // ============================================================================
  // SessionStore
  // ============================================================================

  /**
   * Every saved session, newest first.
   */
  async listAll(): Promise<PracticeSession[]> {
    return this.findAll();
  }

  /**
   * Stages a session for the next {@link save}.
   */
  async add(session: PracticeSession): Promise<void> {
    this.pending.push(session);
  }

  /**
   * Writes every staged session in a single transaction. The staging area
   * is emptied first, so a failed write leaves nothing behind for a later
   * save to pick up.
   */
  async save(): Promise<void> {
    const staged = this.pending;
    this.pending = [];
    if (staged.length > 0) {
      this.insertSessions(staged);
    }
  }

  /**
   * Drops staged sessions without writing them.
   */
  async discard(): Promise<void> {
    this.pending = [];
  }

  /**
   * Inserts sessions and their drills atomically.
   */
  private insertSessions(sessions: readonly PracticeSession[]): void {
    const createdAt = new Date();

    this.db.transaction((tx) => {
      for (const session of sessions) {
        const { drills: sessionDrills, ...fields } = session;

        tx.insert(practiceSessions).values({ ...fields, createdAt }).run();

        if (sessionDrills.length > 0) {
          tx.insert(drills)
            .values(
              sessionDrills.map((drill, position) => ({
                ...drill,
                sessionId: session.id,
                position,
              }))
            )
            .run();
        }
      }
    });
  }
}
