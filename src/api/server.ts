/**
 * Golf Practice Log API Server
 *
 * Builds the Hono application and serves it on Node through
 * `@hono/node-server`, moving up to the next free port when the
 * configured one is taken.
 *
 * The process entry point is src/index.ts; this module has no side effects
 * so tests can build an app against an in-memory database.
 */

import net from 'node:net';
import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { corsMiddleware, errorHandler, ErrorCodes, loggerMiddleware } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import type { AppDependencies } from './types';
import { error } from './utils/response';

/** Highest port tried by findAvailablePort */
const MAX_PORT = 3100;

// ============================================================================
// Port Availability Check
// ============================================================================

/**
 * Finds an available port starting from the preferred port.
 *
 * Binds a throwaway server to each candidate port in turn until one
 * succeeds.
 *
 * @throws Error if no available port is found up to `maxPort`
 *
 * @example
 * ```typescript
 * const port = await findAvailablePort(3001);
 * ```
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = MAX_PORT
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    if (await isPortFree(port)) {
      return port;
    }
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }
  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

function isPortFree(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const tester = net.createServer();
    tester.once('error', () => resolve(false));
    tester.listen(port, () => {
      tester.close(() => resolve(true));
    });
  });
}

// ============================================================================
// Hono Application Setup
// ============================================================================

/**
 * Creates the Hono application: request logger, then CORS, then routes.
 * Errors thrown by any route reach `errorHandler` through `app.onError`.
 */
export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  app.onError(errorHandler({ isProduction: deps.isProduction }));

  app.use('*', loggerMiddleware({ colorize: !deps.isProduction }));
  app.use('*', corsMiddleware({ allowedOrigins: deps.allowedOrigins }));

  app.route('/health', healthRoutes(() => deps.repository.count()));
  app.route('/api', createApiRouter(deps));

  app.notFound((c) =>
    error(c, ErrorCodes.NOT_FOUND, `Route ${c.req.method} ${c.req.path} not found`, 404)
  );

  return app;
}

// ============================================================================
// Server Startup
// ============================================================================

export interface StartServerOptions {
  preferredPort: number;
  hostname: string;
  environment: string;
}

/**
 * Serves the application on the first free port from `preferredPort` and
 * closes the server on SIGINT/SIGTERM.
 */
export async function startServer(app: Hono, options: StartServerOptions): Promise<ServerType> {
  const port = await findAvailablePort(options.preferredPort);

  const server = serve({ fetch: app.fetch, port, hostname: options.hostname }, (info) => {
    console.log('');
    console.log('╔═══════════════════════════════════════════════════════════╗');
    console.log('║              Golf Practice Log API Server                 ║');
    console.log('╠═══════════════════════════════════════════════════════════╣');
    console.log(`║  Server running on http://localhost:${String(info.port).padEnd(22)}║`);
    console.log(`║  Environment: ${options.environment.padEnd(44)}║`);
    console.log('║                                                           ║');
    console.log('║  Endpoints:                                               ║');
    console.log(`║    Health:    http://localhost:${String(info.port).padEnd(4)}/health               ║`);
    console.log(`║    API:       http://localhost:${String(info.port).padEnd(4)}/api                  ║`);
    console.log('╚═══════════════════════════════════════════════════════════╝');
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}
