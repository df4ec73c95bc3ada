/**
 * Hono API server factory: createApp(deps) returns a configured OpenAPIHono instance.
 *
 * Middleware registration order:
 *   1. requestId
 *   2. agentGuard (User-Agent must contain the configured agent string)
 *   3. readyGuard (503 until the serving module's serve() is called)
 *   4. requestLogger
 *
 * Routes for a module are mounted only when that module is supplied.
 * Error handler is registered via app.onError.
 *
 * The returned app is NOT listening -- binding is ApiServer's job.
 */

import { createRequire } from 'node:module';
import { OpenAPIHono } from '@hono/zod-openapi';
import { z } from 'zod';
import type {
  BuildRelease,
  IChainStateModule,
  INetworkModule,
  ITransactionPoolModule,
} from '@poolnode/core';
import type { ApiEnv } from './env.js';
import {
  requestId,
  createAgentGuard,
  createReadyGuard,
  createRequestLogger,
  errorHandler,
  type IsReady,
} from './middleware/index.js';
import {
  daemonRoutes,
  consensusRoutes,
  gatewayRoutes,
  tpoolRoutes,
  openApiValidationHook,
} from './routes/index.js';

const require = createRequire(import.meta.url);
export const DAEMON_VERSION = z.object({ version: z.string() }).parse(require('../../package.json')).version;

export interface CreateAppDeps {
  userAgent: string;
  release: BuildRelease;
  isReady?: IsReady;
  consensus?: IChainStateModule;
  gateway?: INetworkModule;
  tpool?: ITransactionPoolModule;
  requestShutdown?: () => void;
  /** Request log sink. Defaults to console.log. */
  log?: (line: string) => void;
}

export function createApp(deps: CreateAppDeps): OpenAPIHono<ApiEnv> {
  const app = new OpenAPIHono<ApiEnv>({ defaultHook: openApiValidationHook });

  app.use('*', requestId);
  app.use('*', createAgentGuard(deps.userAgent));
  app.use('*', createReadyGuard(deps.isReady ?? (() => true)));
  app.use('*', createRequestLogger(deps.log));

  app.onError(errorHandler);

  app.route(
    '/',
    daemonRoutes({ version: DAEMON_VERSION, release: deps.release, requestShutdown: deps.requestShutdown }),
  );

  if (deps.consensus) {
    app.route('/', consensusRoutes({ consensus: deps.consensus }));
  }
  if (deps.gateway) {
    app.route('/', gatewayRoutes({ gateway: deps.gateway }));
  }
  if (deps.tpool) {
    app.route('/', tpoolRoutes({ tpool: deps.tpool }));
  }

  app.doc('/doc', {
    openapi: '3.0.0',
    info: {
      title: 'poolnode API',
      version: DAEMON_VERSION,
      description: 'Local control API of the poolnode daemon',
    },
  });

  return app;
}
