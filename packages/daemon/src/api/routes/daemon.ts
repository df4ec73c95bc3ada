/**
 * Daemon routes:
 *
 * GET  /daemon/version - build version and release
 * POST /daemon/stop    - request a graceful shutdown
 */

import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import type { BuildRelease } from '@poolnode/core';
import {
  DaemonVersionResponseSchema,
  DaemonStopResponseSchema,
  openApiValidationHook,
} from './openapi-schemas.js';

export interface DaemonRouteDeps {
  version: string;
  release: BuildRelease;
  requestShutdown?: () => void;
}

const versionRoute = createRoute({
  method: 'get',
  path: '/daemon/version',
  tags: ['Daemon'],
  summary: 'Daemon version',
  responses: {
    200: {
      description: 'Version and build release',
      content: { 'application/json': { schema: DaemonVersionResponseSchema } },
    },
  },
});

const stopRoute = createRoute({
  method: 'post',
  path: '/daemon/stop',
  tags: ['Daemon'],
  summary: 'Initiate graceful shutdown',
  responses: {
    200: {
      description: 'Shutdown initiated',
      content: { 'application/json': { schema: DaemonStopResponseSchema } },
    },
  },
});

export function daemonRoutes(deps: DaemonRouteDeps): OpenAPIHono {
  const router = new OpenAPIHono({ defaultHook: openApiValidationHook });

  router.openapi(versionRoute, (c) => c.json({ version: deps.version, release: deps.release }, 200));

  router.openapi(stopRoute, (c) => {
    // Shutdown is deferred so this response is written before the listener closes
    if (deps.requestShutdown) {
      setImmediate(deps.requestShutdown);
    }
    return c.json({ message: 'Shutdown initiated' }, 200);
  });

  return router;
}
