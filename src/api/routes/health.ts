/**
 * Health Check Route
 *
 * Reports whether the API can reach its database, along with the running
 * version. Process supervisors poll it; a 503 means the SQLite file could
 * not be read.
 *
 * ```bash
 * curl http://localhost:3001/health
 * # { "success": true, "data": { "status": "ok", "sessions": 42, ... } }
 * ```
 */

import { Hono } from 'hono';
import { success, error } from '../utils/response';
import { ErrorCodes } from '../middleware/error-handler';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 time of the check */
  timestamp: string;
  environment: string;
  version: string;
  /** Practice sessions currently stored */
  sessions: number;
}

/** Keep in step with package.json. */
export const APP_VERSION = '0.1.0';

/**
 * Creates the health router, mounted at `/health`.
 *
 * @param countSessions - Reads the number of stored sessions; a throw marks the database unavailable
 */
export function healthRoutes(countSessions: () => Promise<number>): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    let sessions: number;
    try {
      sessions = await countSessions();
    } catch (cause) {
      console.error('[Health] Database check failed:', cause);
      return error(c, ErrorCodes.SERVICE_UNAVAILABLE, 'Database unavailable', 503);
    }

    return success<HealthCheckData>(c, {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
      sessions,
    });
  });

  return router;
}
