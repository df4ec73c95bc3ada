/**
 * Request logger middleware: one line per request after the response is ready.
 *
 * Format: [REQ] GET /consensus 200 3ms
 */

import { createMiddleware } from 'hono/factory';
import type { ApiEnv } from '../env.js';

export function createRequestLogger(log: (line: string) => void = console.log) {
  return createMiddleware<ApiEnv>(async (c, next) => {
    const start = Date.now();
    await next();
    log(`[REQ] ${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - start}ms`);
  });
}
