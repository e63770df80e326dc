/**
 * Request Logger Middleware
 *
 * One line per handled request. Uploads also show the declared body size,
 * which is what matters when an import is rejected as too large:
 *
 * ```
 * [API] GET    /api/sessions 200 - 4ms
 * [API] POST   /api/import 200 - 31ms (18.2 KB in)
 * [API] POST   /api/import 413 - 1ms (6.0 MB in)
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  colorize: boolean;
  /** Where lines go; console.log unless replaced */
  write: (line: string) => void;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
} as const;

function statusColor(status: number): string {
  if (status >= 500) return ANSI.red;
  if (status >= 400) return ANSI.yellow;
  return ANSI.green;
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Declared request size from Content-Length, e.g. "18.2 KB".
 * Null when the header is missing or zero.
 */
export function formatRequestSize(contentLength: string | undefined): string | null {
  const bytes = contentLength === undefined ? NaN : Number(contentLength);
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return null;
  }
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Creates the request logger.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ colorize: false }));
 * ```
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const { prefix, skipPaths, colorize, write } = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const { method, path } = c.req;
    if (skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startedAt = performance.now();
    await next();
    const duration = formatDuration(Math.round(performance.now() - startedAt));

    const status = c.res.status;
    const size = formatRequestSize(c.req.header('Content-Length'));
    const suffix = size === null ? '' : ` (${size} in)`;

    write(
      colorize
        ? `${prefix} ${ANSI.cyan}${method.padEnd(6)}${ANSI.reset} ${path} ${statusColor(status)}${status}${ANSI.reset} - ${ANSI.dim}${duration}${suffix}${ANSI.reset}`
        : `${prefix} ${method.padEnd(6)} ${path} ${status} - ${duration}${suffix}`
    );
  };
}

export { DEFAULT_LOGGER_CONFIG };
