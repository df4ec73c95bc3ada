/**
 * Gateway - network module.
 *
 * Binds a TCP listener for inbound peers at construction and dials outbound
 * peers on request. Peer wire protocol is out of scope: a peer is an open
 * socket tracked by its host:port.
 *
 * In-flight work tracked by the module's ShutdownGroup:
 *   - the listener, until its 'close' event
 *   - each peer socket, until its 'close' event
 *   - each outbound dial, until it settles
 * close() fires one hook that closes the listener and destroys every peer
 * socket, then waits for all of the above.
 */

import { mkdir } from 'node:fs/promises';
import { createConnection, createServer, type Server, type Socket } from 'node:net';
import {
  PoolNodeError,
  ShutdownGroup,
  type BuildRelease,
  type INetworkModule,
  type PeerInfo,
} from '@poolnode/core';
import { debugLog } from '../../infrastructure/logging/index.js';
import { GATEWAY_CONSTS, type GatewayConsts } from './consts.js';
import { formatNetAddress, isLocalHost, parseNetAddress, type NetAddress } from './net-address.js';

export interface GatewayOptions {
  release: BuildRelease;
  /** Overrides the release dial timeout. */
  dialTimeoutMs?: number;
  /** Socket factory for outbound dials. Defaults to net.createConnection. */
  connectSocket?: (target: NetAddress) => Socket;
}

interface PeerEntry {
  socket: Socket;
  info: PeerInfo;
}

export class Gateway implements INetworkModule {
  private readonly tg = new ShutdownGroup();
  private readonly peerTable = new Map<string, PeerEntry>();
  private readonly dialing = new Set<string>();
  private readonly consts: GatewayConsts;
  private readonly connectSocket: (target: NetAddress) => Socket;

  private constructor(
    private readonly server: Server,
    private readonly bound: NetAddress,
    readonly persistDir: string,
    options: GatewayOptions,
  ) {
    const base = GATEWAY_CONSTS[options.release];
    this.consts = { ...base, dialTimeoutMs: options.dialTimeoutMs ?? base.dialTimeoutMs };
    this.connectSocket =
      options.connectSocket ?? ((target) => createConnection({ host: target.host, port: target.port }));

    const listenerToken = this.tg.acquire();
    server.once('close', () => this.tg.release(listenerToken));
    server.on('connection', (socket) => this.acceptPeer(socket));
    server.on('error', (err) => console.error(`[gateway] listener error: ${err.message}`));

    this.tg.onStop(() => {
      this.server.close();
      for (const { socket } of this.peerTable.values()) {
        socket.destroy();
      }
      this.peerTable.clear();
    });
  }

  /**
   * Bind `rpcAddr` (`host:port`; empty host = all interfaces, port 0 = any)
   * and start accepting peers. Creates `persistDir`.
   */
  static async create(rpcAddr: string, persistDir: string, options: GatewayOptions): Promise<Gateway> {
    const spec = parseNetAddress(rpcAddr, { listen: true });
    await mkdir(persistDir, { recursive: true, mode: 0o700 });

    const server = createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(spec.port, spec.host || undefined, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const info = server.address();
    if (info === null || typeof info === 'string') {
      server.close();
      throw new Error(`Gateway listener on ${rpcAddr} has no TCP address`);
    }

    return new Gateway(server, { host: info.address, port: info.port }, persistDir, options);
  }

  address(): string {
    return formatNetAddress(this.bound);
  }

  peers(): PeerInfo[] {
    return [...this.peerTable.values()].map(({ info }) => ({ ...info }));
  }

  /**
   * Dial `address` and register it as an outbound peer.
   *
   * @throws PoolNodeError INVALID_ADDRESS, SELF_CONNECT, PEER_ALREADY_CONNECTED,
   *   PEER_LIMIT_REACHED, DIAL_TIMEOUT, DIAL_FAILED, ALREADY_STOPPED
   */
  async connect(address: string): Promise<void> {
    const target = parseNetAddress(address);
    const key = formatNetAddress(target);

    await this.tg.run(async (signal) => {
      if (this.isSelf(target)) {
        throw new PoolNodeError('SELF_CONNECT', { details: { address: key } });
      }
      if (this.peerTable.has(key) || this.dialing.has(key)) {
        throw new PoolNodeError('PEER_ALREADY_CONNECTED', { details: { address: key } });
      }
      if (this.peerTable.size + this.dialing.size >= this.consts.fullyConnectedThreshold) {
        throw new PoolNodeError('PEER_LIMIT_REACHED', {
          details: { limit: this.consts.fullyConnectedThreshold },
        });
      }

      this.dialing.add(key);
      try {
        const socket = await this.dial(target, key, signal);
        this.addPeer(key, socket, false);
        debugLog(`gateway: connected to ${key}`);
      } finally {
        this.dialing.delete(key);
      }
    });
  }

  /** @throws PoolNodeError PEER_NOT_FOUND */
  disconnect(address: string): void {
    const key = formatNetAddress(parseNetAddress(address));
    const entry = this.peerTable.get(key);
    if (!entry) {
      throw new PoolNodeError('PEER_NOT_FOUND', { details: { address: key } });
    }
    this.peerTable.delete(key);
    entry.socket.destroy();
    debugLog(`gateway: disconnected from ${key}`);
  }

  close(): Promise<void> {
    return this.tg.stop();
  }

  // -------------------------------------------------------------------------

  private isSelf(target: NetAddress): boolean {
    if (target.port !== this.bound.port) return false;
    if (target.host === this.bound.host) return true;
    return isLocalHost(target.host) && isLocalHost(this.bound.host);
  }

  private dial(target: NetAddress, key: string, signal: AbortSignal): Promise<Socket> {
    const timeoutMs = this.consts.dialTimeoutMs;

    return new Promise<Socket>((resolve, reject) => {
      const socket = this.connectSocket(target);
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        socket.off('error', onError);
        socket.off('connect', onConnect);
      };
      const fail = (err: PoolNodeError) => {
        cleanup();
        socket.destroy();
        reject(err);
      };
      const onConnect = () => {
        cleanup();
        resolve(socket);
      };
      const onError = (err: Error) => {
        fail(
          new PoolNodeError('DIAL_FAILED', {
            message: `Failed to dial ${key}: ${err.message}`,
            details: { address: key },
            cause: err,
          }),
        );
      };
      const onAbort = () => fail(new PoolNodeError('ALREADY_STOPPED'));

      timer = setTimeout(() => {
        fail(
          new PoolNodeError('DIAL_TIMEOUT', {
            message: `Dial to ${key} timed out after ${timeoutMs}ms`,
            details: { address: key, timeoutMs },
          }),
        );
      }, timeoutMs);
      signal.addEventListener('abort', onAbort, { once: true });
      socket.once('error', onError);
      socket.once('connect', onConnect);
    });
  }

  private acceptPeer(socket: Socket): void {
    const { remoteAddress, remotePort } = socket;
    const key =
      remoteAddress === undefined || remotePort === undefined
        ? null
        : formatNetAddress({ host: remoteAddress, port: remotePort });
    if (
      this.tg.isStopped() ||
      key === null ||
      this.peerTable.has(key) ||
      this.dialing.has(key) ||
      this.peerTable.size >= this.consts.fullyConnectedThreshold
    ) {
      debugLog(`gateway: refusing inbound connection from ${key ?? 'unknown'}`);
      socket.destroy();
      return;
    }
    this.addPeer(key, socket, true);
  }

  private addPeer(key: string, socket: Socket, inbound: boolean): void {
    if (this.tg.isStopped()) {
      socket.destroy();
      throw new PoolNodeError('ALREADY_STOPPED');
    }
    const token = this.tg.acquire();
    // Each entry owns its socket; a displaced one is dropped with it
    this.peerTable.get(key)?.socket.destroy();
    this.peerTable.set(key, { socket, info: { address: key, inbound, connectedAt: Date.now() } });

    socket.on('error', (err) => debugLog(`gateway: peer ${key} error: ${err.message}`));
    socket.once('close', () => {
      if (this.peerTable.get(key)?.socket === socket) {
        this.peerTable.delete(key);
      }
      this.tg.release(token);
    });
  }
}
