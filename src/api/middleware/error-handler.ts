/**
 * API Error Handling
 *
 * Routes answer expected failures themselves (bad query, unknown id,
 * oversized upload). Anything they throw ends up here through
 * `app.onError` and is turned into the same error envelope:
 *
 * | thrown                 | status | code              |
 * |------------------------|--------|-------------------|
 * | AppError               | own    | own               |
 * | ImportError            | 400    | IMPORT_FAILED     |
 * | LogSessionError        | 400    | INVALID_SESSION   |
 * | anything else          | 500    | INTERNAL_ERROR    |
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler({ isProduction: true }));
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ImportError } from '@/core/import';
import { LogSessionError } from '@/core/practice';
import type { ApiError, ApiErrorResponse } from '../types';

export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  IMPORT_FAILED: 'IMPORT_FAILED',
  INVALID_SESSION: 'INVALID_SESSION',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * A failure a route raises on purpose, carrying its HTTP status.
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

interface ClassifiedError {
  statusCode: ContentfulStatusCode;
  body: ApiError;
}

function classify(err: Error, isProduction: boolean): ClassifiedError {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: {
        code: err.code,
        message: err.message,
        ...(err.details !== undefined && { details: err.details }),
      },
    };
  }

  if (err instanceof ImportError) {
    return {
      statusCode: 400,
      body: { code: ErrorCodes.IMPORT_FAILED, message: err.message, details: { kind: err.kind } },
    };
  }

  if (err instanceof LogSessionError) {
    return {
      statusCode: 400,
      body: {
        code: ErrorCodes.INVALID_SESSION,
        message: err.message,
        details: { kind: err.kind, drillIndex: err.drillIndex },
      },
    };
  }

  if (isProduction) {
    return {
      statusCode: 500,
      body: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred. Please try again.',
      },
    };
  }

  return {
    statusCode: 500,
    body: { code: ErrorCodes.INTERNAL_ERROR, message: err.message, details: { stack: err.stack } },
  };
}

/**
 * Creates the handler for `app.onError`. Server-side failures are logged;
 * their message and stack only reach the client outside production.
 */
export function errorHandler(options: { isProduction?: boolean } = {}): ErrorHandler {
  const isProduction = options.isProduction ?? process.env.NODE_ENV === 'production';

  return (err, c) => {
    const { statusCode, body } = classify(err, isProduction);

    if (statusCode >= 500) {
      console.error(`[Error Handler] ${c.req.method} ${c.req.path}:`, err);
    }

    const response: ApiErrorResponse = { success: false, error: body };
    return c.json(response, statusCode);
  };
}
