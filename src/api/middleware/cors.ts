/**
 * CORS for the API.
 *
 * Browsers on other origins (a local web front end, a spreadsheet add-in)
 * may call the API. Development allows the usual local dev-server origins;
 * production allows only the origins listed in ALLOWED_ORIGINS.
 *
 * @example
 * ```typescript
 * app.use('*', corsMiddleware({ allowedOrigins: config.cors.allowedOrigins }));
 * ```
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
  /** Response headers readable by browser scripts */
  exposeHeaders: string[];
  /** Preflight cache lifetime in seconds */
  maxAge: number;
}

const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: [
    'http://localhost:5173',
    'http://127.0.0.1:5173',
    'http://localhost:4173',
  ],
  allowedMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  // Downloads need the file name from Content-Disposition
  exposeHeaders: ['Content-Disposition'],
  maxAge: 86400,
};

/**
 * An empty `allowedOrigins` (ALLOWED_ORIGINS unset) keeps the local
 * development origins.
 */
export function corsMiddleware(overrides: Partial<CorsConfig> = {}): MiddlewareHandler {
  const { allowedOrigins, allowedMethods, allowedHeaders, exposeHeaders, maxAge } = {
    ...DEFAULT_CORS_CONFIG,
    ...overrides,
  };

  return cors({
    origin: allowedOrigins.length > 0 ? allowedOrigins : DEFAULT_CORS_CONFIG.allowedOrigins,
    allowMethods: allowedMethods,
    allowHeaders: allowedHeaders,
    exposeHeaders,
    maxAge,
  });
}

export { DEFAULT_CORS_CONFIG };
