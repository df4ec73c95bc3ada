/**
 * Miner-facing pool API:
 *
 * GET /fee     - pool fee in hundredths of a percent
 * GET /version - daemon version
 *
 * Miners are plain HTTP clients, so there is no agent guard here. The ready
 * guard, request log and error bodies are the control API's.
 */

import { OpenAPIHono, createRoute, z } from '@hono/zod-openapi';
import type { ApiEnv } from '../../api/env.js';
import {
  requestId,
  createReadyGuard,
  createRequestLogger,
  errorHandler,
  type IsReady,
} from '../../api/middleware/index.js';
import { openApiValidationHook } from '../../api/routes/openapi-schemas.js';

export const PoolFeeResponseSchema = z
  .object({
    fee: z.number().int(),
  })
  .openapi('PoolFeeResponse');

export const PoolVersionResponseSchema = z
  .object({
    version: z.string(),
  })
  .openapi('PoolVersionResponse');

export interface PoolAppDeps {
  fee: number;
  version: string;
  isReady?: IsReady;
  log?: (line: string) => void;
}

const feeRoute = createRoute({
  method: 'get',
  path: '/fee',
  tags: ['Pool'],
  summary: 'Pool fee',
  responses: {
    200: {
      description: 'Fee in hundredths of a percent',
      content: { 'application/json': { schema: PoolFeeResponseSchema } },
    },
  },
});

const versionRoute = createRoute({
  method: 'get',
  path: '/version',
  tags: ['Pool'],
  summary: 'Pool node version',
  responses: {
    200: {
      description: 'Daemon version',
      content: { 'application/json': { schema: PoolVersionResponseSchema } },
    },
  },
});

export function createPoolApp(deps: PoolAppDeps): OpenAPIHono<ApiEnv> {
  const app = new OpenAPIHono<ApiEnv>({ defaultHook: openApiValidationHook });

  app.use('*', requestId);
  app.use('*', createReadyGuard(deps.isReady ?? (() => true)));
  app.use('*', createRequestLogger(deps.log));

  app.onError(errorHandler);

  app.openapi(feeRoute, (c) => c.json({ fee: deps.fee }, 200));
  app.openapi(versionRoute, (c) => c.json({ version: deps.version }, 200));

  return app;
}
