/**
 * ApiServer - serving module for the local control API.
 *
 * create() binds the listen address, so a port conflict fails construction.
 * Requests are refused with API_NOT_READY until serve() is called.
 */

import type { OpenAPIHono } from '@hono/zod-openapi';
import type {
  BuildRelease,
  IChainStateModule,
  INetworkModule,
  ITransactionPoolModule,
} from '@poolnode/core';
import type { ApiEnv } from './env.js';
import { HttpServingModule, bindHttpServer, type BoundHttpServer, type Readiness } from './http-serving-module.js';
import { createApp } from './server.js';

export interface ApiServerDeps {
  /** host:port to bind. */
  addr: string;
  userAgent: string;
  release: BuildRelease;
  consensus: IChainStateModule;
  gateway: INetworkModule;
  tpool: ITransactionPoolModule;
  requestShutdown?: () => void;
}

export class ApiServer extends HttpServingModule {
  private constructor(
    listener: BoundHttpServer,
    readiness: Readiness,
    readonly app: OpenAPIHono<ApiEnv>,
  ) {
    super(listener, readiness, 'api');
  }

  static async create(deps: ApiServerDeps): Promise<ApiServer> {
    const readiness: Readiness = { accepting: false };

    const app = createApp({
      userAgent: deps.userAgent,
      release: deps.release,
      isReady: () => readiness.accepting,
      consensus: deps.consensus,
      gateway: deps.gateway,
      tpool: deps.tpool,
      requestShutdown: deps.requestShutdown,
    });

    const listener = await bindHttpServer(deps.addr, app.fetch);
    return new ApiServer(listener, readiness, app);
  }
}
