/**
 * The `/api` router. `/health` sits outside it, at the root.
 *
 * - `GET /api` lists the endpoints
 * - `/api/sessions` logs, lists, shows and deletes sessions, and reports stats
 * - `/api/templates` manages the drill template catalog
 * - `/api/export` and `/api/import` move sessions in and out as files
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes(() => repository.count()));
 * app.route('/api', createApiRouter(deps));
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import type { AppDependencies } from '../types';
import { APP_VERSION } from './health';
import { sessionsRoutes } from './sessions';
import { templatesRoutes } from './templates';
import { transferRoutes } from './transfer';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { sessionsRoutes, type SessionsRouteOptions } from './sessions';
export { templatesRoutes } from './templates';
export { transferRoutes, type ImportResponse, type TransferRouteOptions } from './transfer';

export interface ApiInfo {
  name: string;
  version: string;
  /** `path` is method and path, e.g. "GET /api/sessions" */
  endpoints: { path: string; description: string }[];
}

export function createApiRouter(deps: AppDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Golf Practice Log API',
      version: APP_VERSION,
      endpoints: [
        { path: 'GET /api/sessions', description: 'List practice sessions, newest first' },
        { path: 'POST /api/sessions', description: 'Log a practice session from drill templates' },
        { path: 'GET /api/sessions/stats', description: 'Session totals and success by category' },
        { path: 'GET /api/sessions/:id', description: 'Practice session with drills' },
        { path: 'DELETE /api/sessions/:id', description: 'Delete a practice session' },
        { path: 'GET /api/templates', description: 'List drill templates' },
        { path: 'GET /api/templates/:id', description: 'Drill template' },
        { path: 'POST /api/templates', description: 'Add a custom drill template' },
        { path: 'PATCH /api/templates/:id', description: 'Edit a drill template' },
        { path: 'DELETE /api/templates/:id', description: 'Delete or hide a drill template' },
        { path: 'POST /api/templates/reset', description: 'Restore the built-in templates' },
        { path: 'GET /api/export', description: 'Download sessions as CSV or JSON' },
        { path: 'POST /api/import', description: 'Import sessions from a CSV file' },
        { path: 'GET /health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route(
    '/sessions',
    sessionsRoutes({ repository: deps.repository, practiceLog: deps.practiceLog, clock: deps.clock })
  );
  router.route('/templates', templatesRoutes(deps.templateService));

  router.route(
    '/',
    transferRoutes({
      repository: deps.repository,
      exportService: deps.exportService,
      importService: deps.importService,
      maxImportBytes: deps.maxImportBytes,
      clock: deps.clock,
    })
  );

  return router;
}

export default createApiRouter;
