/**
 * Response helpers for route handlers.
 *
 * JSON endpoints answer with the envelope from types.ts:
 * `{ success: true, data }` or `{ success: false, error: { code, message, details? } }`.
 * File downloads bypass the envelope and go through {@link download}.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ErrorCodes } from '../middleware/error-handler';
import type { ApiResponse, ApiErrorResponse } from '../types';

export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = { success: true, data };
  return c.json(response, statusCode);
}

/**
 * Error envelope. `details` is omitted from the body when not given.
 *
 * @example
 * ```typescript
 * return error(c, ErrorCodes.PAYLOAD_TOO_LARGE, 'Import file is too large', 413, { maxBytes });
 * ```
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 500,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}

export function notFound(c: Context, resource: string, id: string): Response {
  return error(c, ErrorCodes.NOT_FOUND, `${resource} with ID '${id}' not found`, 404, {
    resource,
    id,
  });
}

export function badRequest(c: Context, message: string, details?: unknown): Response {
  return error(c, ErrorCodes.BAD_REQUEST, message, 400, details);
}

/**
 * Text file served as an attachment, e.g. a CSV export.
 */
export function download(
  c: Context,
  body: string,
  file: { name: string; mimeType: string }
): Response {
  return c.body(body, 200, {
    'Content-Type': `${file.mimeType}; charset=utf-8`,
    'Content-Disposition': `attachment; filename="${file.name}"`,
  });
}
