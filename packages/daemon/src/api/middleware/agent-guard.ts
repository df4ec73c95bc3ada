/**
 * Agent guard: the API is for the poolnode CLI and scripts, not browsers.
 * Every request must carry a User-Agent containing the configured agent
 * string, otherwise 400 BROWSER_ACCESS_DISABLED.
 */

import { createMiddleware } from 'hono/factory';
import { PoolNodeError } from '@poolnode/core';
import type { ApiEnv } from '../env.js';

export function createAgentGuard(userAgent: string) {
  return createMiddleware<ApiEnv>(async (c, next) => {
    const agent = c.req.header('User-Agent') ?? '';
    if (!agent.includes(userAgent)) {
      throw new PoolNodeError('BROWSER_ACCESS_DISABLED', {
        message: `Browser access disabled: User-Agent must contain '${userAgent}'`,
      });
    }
    await next();
  });
}
