/**
 * PoolServer - the pool module. Binds bind_addr at construction and answers
 * miners once serve() is called, alongside the control API.
 */

import type { OpenAPIHono } from '@hono/zod-openapi';
import type { IPoolModule } from '@poolnode/core';
import type { ApiEnv } from '../../api/env.js';
import {
  HttpServingModule,
  bindHttpServer,
  type BoundHttpServer,
  type Readiness,
} from '../../api/http-serving-module.js';
import { DAEMON_VERSION } from '../../api/server.js';
import { createPoolApp } from './pool-app.js';

export interface PoolServerOptions {
  /** host:port to bind; ':9985' listens on every interface. */
  addr: string;
  /** Hundredths of a percent. */
  fee: number;
  log?: (line: string) => void;
}

export class PoolServer extends HttpServingModule implements IPoolModule {
  private constructor(
    listener: BoundHttpServer,
    readiness: Readiness,
    readonly fee: number,
    readonly app: OpenAPIHono<ApiEnv>,
  ) {
    super(listener, readiness, 'pool');
  }

  static async create(options: PoolServerOptions): Promise<PoolServer> {
    const readiness: Readiness = { accepting: false };
    const app = createPoolApp({
      fee: options.fee,
      version: DAEMON_VERSION,
      isReady: () => readiness.accepting,
      log: options.log,
    });

    const listener = await bindHttpServer(options.addr, app.fetch);
    return new PoolServer(listener, readiness, options.fee, app);
  }
}
