/**
 * Sessions API Routes
 *
 * Logging, reading and deleting practice sessions.
 *
 * Endpoints:
 * - GET /sessions - List sessions, newest first (?range=, ?limit=)
 * - POST /sessions - Log a session from drill templates
 * - GET /sessions/stats - Totals and per-category success (?range=)
 * - GET /sessions/:id - Session with its drills and conditions
 * - DELETE /sessions/:id - Delete a session and its drills
 */

import { Hono } from 'hono';
import {
  averageSuccessPercentage,
  displayScore,
  locationSummary,
  successPercentage,
  totalDrills,
  weatherSummary,
  type PracticeSession,
} from '@/core/models';
import { filterSessionsByRange } from '@/core/export';
import { practiceStats, type PracticeLogService } from '@/core/practice';
import type { PracticeSessionRepository } from '@/storage';
import { success, notFound, badRequest } from '../utils/response';
import { parseJsonBody } from '../utils/request';
import {
  logSessionBodySchema,
  sessionListQuerySchema,
  statsQuerySchema,
  toValidationDetails,
  type DrillDetail,
  type SessionSummary,
} from '../types';

// ============================================================================
// Response Types
// ============================================================================

interface SessionListResponse {
  sessions: SessionSummary[];
  /** Sessions in the requested range before `limit` was applied */
  total: number;
}

interface SessionDetailResponse {
  session: Omit<PracticeSession, 'drills'> & { drills: DrillDetail[] };
  summary: SessionSummary;
}

// ============================================================================
// Helper Functions
// ============================================================================

function toDetail(session: PracticeSession): SessionDetailResponse {
  return {
    session: {
      ...session,
      drills: session.drills.map((drill) => ({
        ...drill,
        displayScore: displayScore(drill),
        successPercentage: successPercentage(drill),
      })),
    },
    summary: toSummary(session),
  };
}

function toSummary(session: PracticeSession): SessionSummary {
  return {
    id: session.id,
    date: session.date,
    notes: session.notes,
    totalDrills: totalDrills(session),
    averageSuccessPercentage: averageSuccessPercentage(session),
    weatherSummary: weatherSummary(session),
    locationSummary: locationSummary(session),
  };
}

// ============================================================================
// Route Definitions
// ============================================================================

export interface SessionsRouteOptions {
  /** Store the sessions are read from and deleted in */
  repository: PracticeSessionRepository;
  /** Builds and stores sessions posted by clients */
  practiceLog: PracticeLogService;
  /** Current time used for range filtering */
  clock?: () => Date;
}

/**
 * Creates the sessions router.
 */
export function sessionsRoutes(options: SessionsRouteOptions): Hono {
  const { repository, practiceLog } = options;
  const clock = options.clock ?? (() => new Date());
  const router = new Hono();

  /**
   * GET /
   *
   * Query parameters:
   * - range: week | month | threeMonths | sixMonths | year | all (default all)
   * - limit: maximum number of sessions returned
   *
   * Response:
   * - 200 OK: { sessions, total }
   * - 400 Bad Request: invalid query
   */
  router.get('/', async (c) => {
    const parsed = sessionListQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return badRequest(c, 'Invalid query parameters', toValidationDetails(parsed.error));
    }

    const { range, limit } = parsed.data;
    const inRange = filterSessionsByRange(await repository.findAll(), range, clock());
    const page = limit === undefined ? inRange : inRange.slice(0, limit);

    const response: SessionListResponse = {
      sessions: page.map(toSummary),
      total: inRange.length,
    };

    return success(c, response);
  });

  /**
   * POST /
   *
   * Body: see logSessionBodySchema. Drills are built from their templates;
   * a missing date means now.
   *
   * Response:
   * - 201 Created: the stored session, as GET /:id returns it
   * - 400 Bad Request: invalid body, unknown template or out-of-range score
   */
  router.post('/', async (c) => {
    const body = await parseJsonBody(c, logSessionBodySchema);
    if (!body.success) {
      return body.response;
    }

    const session = await practiceLog.logSession(body.data);
    console.log(`[API] Logged practice session ${session.id} (${totalDrills(session)} drills)`);

    return success(c, toDetail(session), 201);
  });

  /**
   * GET /stats
   *
   * Query parameters:
   * - range: week | month | threeMonths | sixMonths | year | all (default all)
   *
   * Response:
   * - 200 OK: { totalSessions, totalDrills, averageDrillsPerSession, categories }
   * - 400 Bad Request: invalid query
   */
  router.get('/stats', async (c) => {
    const parsed = statsQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return badRequest(c, 'Invalid query parameters', toValidationDetails(parsed.error));
    }

    const inRange = filterSessionsByRange(await repository.findAll(), parsed.data.range, clock());
    return success(c, practiceStats(inRange));
  });

  /**
   * GET /:id
   *
   * Response:
   * - 200 OK: session with drills in logged order
   * - 404 Not Found: no session with this ID
   */
  router.get('/:id', async (c) => {
    const id = c.req.param('id');

    const session = await repository.findById(id);
    if (!session) {
      return notFound(c, 'Practice session', id);
    }

    return success(c, toDetail(session));
  });

  /**
   * DELETE /:id
   *
   * Response:
   * - 200 OK: { id, deleted: true }
   * - 404 Not Found: no session with this ID
   */
  router.delete('/:id', async (c) => {
    const id = c.req.param('id');

    const session = await repository.findById(id);
    if (!session) {
      return notFound(c, 'Practice session', id);
    }

    await repository.delete(id);
    console.log(`[API] Deleted practice session ${id} (${totalDrills(session)} drills)`);

    return success(c, { id, deleted: true });
  });

  return router;
}
