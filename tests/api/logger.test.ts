/**
 * Request Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { loggerMiddleware } from '../../src/api/middleware';
import { formatRequestSize } from '../../src/api/middleware/logger';

function loggedApp(lines: string[]): Hono {
  const app = new Hono();
  app.use('*', loggerMiddleware({ colorize: false, write: (line) => lines.push(line) }));
  app.get('/health', (c) => c.text('ok'));
  app.get('/api/sessions', (c) => c.json([]));
  app.post('/api/import', (c) => c.text('too big', 413));
  return app;
}

describe('loggerMiddleware', () => {
  it('should log method, path and status', async () => {
    const lines: string[] = [];

    await loggedApp(lines).request('/api/sessions');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] GET {4}\/api\/sessions 200 - \d+ms$/);
  });

  it('should add the declared upload size', async () => {
    const lines: string[] = [];

    await loggedApp(lines).request('/api/import', {
      method: 'POST',
      headers: { 'Content-Length': '2048' },
      body: 'x'.repeat(2048),
    });

    expect(lines[0]).toMatch(/^\[API\] POST {3}\/api\/import 413 - \d+ms \(2\.0 KB in\)$/);
  });

  it('should skip health checks', async () => {
    const lines: string[] = [];

    await loggedApp(lines).request('/health');

    expect(lines).toEqual([]);
  });
});

describe('formatRequestSize', () => {
  it('should scale bytes to B, KB and MB', () => {
    expect(formatRequestSize('512')).toBe('512 B');
    expect(formatRequestSize('18637')).toBe('18.2 KB');
    expect(formatRequestSize(String(6 * 1024 * 1024))).toBe('6.0 MB');
  });

  it('should ignore missing, zero and malformed values', () => {
    expect(formatRequestSize(undefined)).toBeNull();
    expect(formatRequestSize('0')).toBeNull();
    expect(formatRequestSize('lots')).toBeNull();
  });
});
