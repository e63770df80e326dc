/**
 * Error Handler Tests
 *
 * Mounts throwing routes on a bare Hono app with `errorHandler` registered
 * and checks the error envelope for each kind of failure.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Hono } from 'hono';
import { AppError, ErrorCodes, errorHandler } from '../../src/api/middleware';
import { ImportError } from '../../src/core/import';
import { LogSessionError } from '../../src/core/practice';
import type { ApiErrorResponse } from '../../src/api/types';
import { getJsonResponse } from '../helpers';

function appThrowing(error: Error, isProduction: boolean): Hono {
  const app = new Hono();
  app.onError(errorHandler({ isProduction }));
  app.get('/boom', () => {
    throw error;
  });
  return app;
}

describe('errorHandler', () => {
  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use the status and code of an AppError', async () => {
    const app = appThrowing(
      new AppError(ErrorCodes.VALIDATION_ERROR, 'Range is required', 422, { field: 'range' }),
      false
    );

    const response = await app.request('/boom');
    const json = await getJsonResponse<ApiErrorResponse>(response);

    expect(response.status).toBe(422);
    expect(json).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Range is required', details: { field: 'range' } },
    });
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should map an ImportError to IMPORT_FAILED', async () => {
    const app = appThrowing(new ImportError('invalidFileFormat'), false);

    const response = await app.request('/boom');
    const json = await getJsonResponse<ApiErrorResponse>(response);

    expect(response.status).toBe(400);
    expect(json.error).toEqual({
      code: 'IMPORT_FAILED',
      message: 'Invalid file format. Please select a CSV file.',
      details: { kind: 'invalidFileFormat' },
    });
  });

  it('should map a LogSessionError to INVALID_SESSION', async () => {
    const app = appThrowing(
      new LogSessionError('missingResult', '"Lag Putting" is a completion drill and needs isCompleted', 1),
      true
    );

    const response = await app.request('/boom');
    const json = await getJsonResponse<ApiErrorResponse>(response);

    expect(response.status).toBe(400);
    expect(json.error).toEqual({
      code: 'INVALID_SESSION',
      message: '"Lag Putting" is a completion drill and needs isCompleted',
      details: { kind: 'missingResult', drillIndex: 1 },
    });
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should expose the message of an unexpected error outside production', async () => {
    const app = appThrowing(new Error('disk full'), false);

    const response = await app.request('/boom');
    const json = await getJsonResponse<ApiErrorResponse>(response);

    expect(response.status).toBe(500);
    expect(json.error.code).toBe('INTERNAL_ERROR');
    expect(json.error.message).toBe('disk full');
    expect(json.error.details).toHaveProperty('stack');
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('should hide the details of an unexpected error in production', async () => {
    const app = appThrowing(new Error('disk full'), true);

    const json = await getJsonResponse<ApiErrorResponse>(await app.request('/boom'));

    expect(json.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Please try again.',
    });
  });
});
