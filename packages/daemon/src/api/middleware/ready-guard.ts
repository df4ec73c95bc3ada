/**
 * Ready guard: the listener is bound when the serving module is constructed,
 * but requests are answered with 503 API_NOT_READY until serve() is called.
 */

import { createMiddleware } from 'hono/factory';
import { PoolNodeError } from '@poolnode/core';
import type { ApiEnv } from '../env.js';

export type IsReady = () => boolean;

export function createReadyGuard(isReady: IsReady) {
  return createMiddleware<ApiEnv>(async (_c, next) => {
    if (!isReady()) {
      throw new PoolNodeError('API_NOT_READY');
    }
    await next();
  });
}
