/**
 * Request ID middleware: attaches a UUID to every request.
 *
 * - Uses the client's X-Request-Id header when present
 * - Sets X-Request-Id on the response
 * - Stores the id in c.set('requestId', id) for the error handler
 */

import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { ApiEnv } from '../env.js';

export const requestId = createMiddleware<ApiEnv>(async (c, next) => {
  const id = c.req.header('X-Request-Id') || randomUUID();

  c.set('requestId', id);
  c.header('X-Request-Id', id);

  await next();
});
