/**
 * HttpServingModule - an HTTP listener managed as a serving module.
 *
 * bindHttpServer() binds at construction time so a port conflict fails the
 * stage. Until serve() is called the handler sees readiness.accepting === false
 * and answers 503. serve() resolves when the listener closes and rejects with
 * the server's fatal error, if it had one.
 */

import { createServer, type Server } from 'node:http';
import { getRequestListener } from '@hono/node-server';
import { ShutdownGroup, type IServingModule } from '@poolnode/core';
import { formatNetAddress, parseNetAddress, type NetAddress } from '../modules/gateway/net-address.js';

export interface Readiness {
  accepting: boolean;
}

export interface BoundHttpServer {
  server: Server;
  bound: NetAddress;
}

function listen(server: Server, spec: NetAddress): Promise<NetAddress> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(spec.port, spec.host || undefined, () => {
      server.off('error', reject);
      const info = server.address();
      if (info === null || typeof info === 'string') {
        reject(new Error('HTTP listener has no TCP address'));
        return;
      }
      resolve({ host: info.address, port: info.port });
    });
  });
}

export async function bindHttpServer(
  addr: string,
  fetch: (request: Request) => Response | Promise<Response>,
): Promise<BoundHttpServer> {
  const spec = parseNetAddress(addr, { listen: true });
  const server = createServer(getRequestListener(fetch));
  const bound = await listen(server, spec);
  return { server, bound };
}

export abstract class HttpServingModule implements IServingModule {
  private readonly tg = new ShutdownGroup();
  private readonly bound: NetAddress;
  private readonly closed: Promise<void>;
  private fatalError: Error | null = null;

  protected constructor(
    { server, bound }: BoundHttpServer,
    private readonly readiness: Readiness,
    label: string,
  ) {
    this.bound = bound;
    const listenerToken = this.tg.acquire();
    this.closed = new Promise((resolve) => {
      server.once('close', () => {
        this.tg.release(listenerToken);
        resolve();
      });
    });

    server.on('error', (err) => {
      console.error(`[${label}] server error: ${err.message}`);
      this.fatalError ??= err;
      if (server.listening) server.close();
    });

    this.tg.onStop(() => {
      this.readiness.accepting = false;
      if (server.listening) server.close();
    });
  }

  address(): string {
    return formatNetAddress(this.bound);
  }

  /** Start answering requests; resolves once the listener has closed. */
  async serve(): Promise<void> {
    if (!this.tg.isStopped()) {
      this.readiness.accepting = true;
    }
    await this.closed;
    if (this.fatalError) {
      throw this.fatalError;
    }
  }

  close(): Promise<void> {
    return this.tg.stop();
  }
}
