/**
 * Request body parsing for JSON endpoints.
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import { ErrorCodes } from '../middleware/error-handler';
import { toValidationDetails } from '../types';
import { error } from './response';

export type BodyParseResult<T> =
  | { success: true; data: T }
  | { success: false; response: Response };

/**
 * Reads the request body as JSON and validates it against `schema`.
 * Malformed JSON answers 400 `INVALID_JSON`; schema failures answer 400
 * `VALIDATION_ERROR` with one detail per field.
 *
 * @example
 * ```typescript
 * const body = await parseJsonBody(c, logSessionBodySchema);
 * if (!body.success) {
 *   return body.response;
 * }
 * ```
 */
export async function parseJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<BodyParseResult<z.output<T>>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (err) {
    if (err instanceof SyntaxError) {
      return {
        success: false,
        response: error(c, ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400),
      };
    }
    throw err;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = toValidationDetails(parsed.error);
    return {
      success: false,
      response: error(c, ErrorCodes.VALIDATION_ERROR, 'Invalid request body', 400, details),
    };
  }
  return { success: true, data: parsed.data };
}
