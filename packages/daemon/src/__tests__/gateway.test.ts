/**
 * Tests for the Gateway network module: address parsing, peer connect/disconnect
 * over loopback, dial failures, and shutdown while dials are in flight.
 */

import { describe, it, expect, vi, afterEach, afterAll } from 'vitest';
import { Socket, createConnection, createServer } from 'node:net';
import { rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { PoolNodeError } from '@poolnode/core';
import {
  Gateway,
  GATEWAY_CONSTS,
  parseNetAddress,
  formatNetAddress,
  isLocalHost,
  type GatewayOptions,
} from '../modules/gateway/index.js';

const tempDirs: string[] = [];
const live: Gateway[] = [];

async function createGateway(options: Partial<GatewayOptions> = {}): Promise<Gateway> {
  const dir = join(tmpdir(), `poolnode-gateway-test-${randomUUID()}`);
  tempDirs.push(dir);
  const gateway = await Gateway.create('127.0.0.1:0', dir, { release: 'testing', ...options });
  live.push(gateway);
  return gateway;
}

/** Socket that never connects or errors; only the dial timer or a stop settles it. */
const silentSocket = () => new Socket();

afterEach(async () => {
  for (const gateway of live.splice(0)) {
    await gateway.close().catch(() => undefined);
  }
});

afterAll(() => {
  for (const dir of tempDirs) {
    if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
  }
});

// ---------------------------------------------------------------------------
// Address parsing
// ---------------------------------------------------------------------------

describe('parseNetAddress', () => {
  it('parses host:port', () => {
    expect(parseNetAddress('seed1.poolnode.example:9981')).toEqual({ host: 'seed1.poolnode.example', port: 9981 });
  });

  it('parses bracketed IPv6 hosts', () => {
    expect(parseNetAddress('[::1]:9981')).toEqual({ host: '::1', port: 9981 });
  });

  it('allows an empty host and port 0 only for listen addresses', () => {
    expect(parseNetAddress(':0', { listen: true })).toEqual({ host: '', port: 0 });
    expect(() => parseNetAddress(':9981')).toThrow("Invalid address ':9981': host is required");
    expect(() => parseNetAddress('127.0.0.1:0')).toThrow("Invalid address '127.0.0.1:0': port out of range");
  });

  it('rejects malformed addresses with INVALID_ADDRESS', () => {
    expect(() => parseNetAddress('nope')).toThrow("Invalid address 'nope': expected host:port");
    expect(() => parseNetAddress('::1:9981')).toThrow("Invalid address '::1:9981': IPv6 hosts must be bracketed");
    expect(() => parseNetAddress('host:port')).toThrow("Invalid address 'host:port': port must be numeric");
    expect(() => parseNetAddress('host:70000')).toThrow("Invalid address 'host:70000': port out of range");
    expect(() => parseNetAddress('bad host:1')).toThrow("Invalid address 'bad host:1': host contains whitespace");

    try {
      parseNetAddress('nope');
    } catch (err) {
      expect((err as PoolNodeError).code).toBe('INVALID_ADDRESS');
    }
  });

  it('formats IPv6 hosts with brackets', () => {
    expect(formatNetAddress({ host: '::1', port: 1 })).toBe('[::1]:1');
    expect(formatNetAddress({ host: '10.0.0.1', port: 2 })).toBe('10.0.0.1:2');
  });

  it('treats loopback and wildcard hosts as local', () => {
    for (const host of ['', 'localhost', '127.0.0.1', '::1', '0.0.0.0', '::']) {
      expect(isLocalHost(host)).toBe(true);
    }
    expect(isLocalHost('10.0.0.1')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

describe('Gateway', () => {
  it('binds an ephemeral port and reports its address', async () => {
    const gateway = await createGateway();
    expect(gateway.address()).toMatch(/^127\.0\.0\.1:\d+$/);
    expect(gateway.address()).not.toBe('127.0.0.1:0');
    expect(gateway.peers()).toEqual([]);
  });

  it('fails to bind an address already in use', async () => {
    const first = await createGateway();
    await expect(
      Gateway.create(first.address(), join(tmpdir(), `poolnode-gateway-test-${randomUUID()}`), { release: 'testing' }),
    ).rejects.toMatchObject({ code: 'EADDRINUSE' });
  });

  it('connects two gateways and tracks the peer on both sides', async () => {
    const a = await createGateway();
    const b = await createGateway();

    await a.connect(b.address());

    expect(a.peers()).toEqual([
      { address: b.address(), inbound: false, connectedAt: expect.any(Number) },
    ]);
    await vi.waitFor(() => expect(b.peers()).toHaveLength(1));
    expect(b.peers()[0]?.inbound).toBe(true);
  });

  it('returns copies from peers()', async () => {
    const a = await createGateway();
    const b = await createGateway();
    await a.connect(b.address());

    const [snapshot] = a.peers();
    if (!snapshot) throw new Error('expected one peer');
    snapshot.inbound = true;
    expect(a.peers()[0]?.inbound).toBe(false);
  });

  it('rejects connecting to itself', async () => {
    const gateway = await createGateway();
    await expect(gateway.connect(gateway.address())).rejects.toMatchObject({ code: 'SELF_CONNECT' });

    const port = gateway.address().split(':')[1];
    await expect(gateway.connect(`localhost:${port}`)).rejects.toMatchObject({ code: 'SELF_CONNECT' });
  });

  it('rejects a duplicate connection', async () => {
    const a = await createGateway();
    const b = await createGateway();
    await a.connect(b.address());
    await expect(a.connect(b.address())).rejects.toMatchObject({ code: 'PEER_ALREADY_CONNECTED' });
  });

  it('refuses an inbound socket from an address that is already a peer', async () => {
    const gateway = await createGateway();
    const accepted: Socket[] = [];
    const remote = createServer((socket) => accepted.push(socket));
    await new Promise<void>((resolve) => remote.listen(0, '127.0.0.1', () => resolve()));
    const bound = remote.address();
    if (bound === null || typeof bound === 'string') throw new Error('no port');
    const peerAddress = `127.0.0.1:${bound.port}`;

    await gateway.connect(peerAddress);
    // Free the port so a client socket can use it as its source port
    remote.close();
    await new Promise((resolve) => setImmediate(resolve));

    const inbound = createConnection({
      ...parseNetAddress(gateway.address()),
      localAddress: '127.0.0.1',
      localPort: bound.port,
    });
    inbound.on('error', () => undefined);
    await new Promise<void>((resolve) => inbound.once('close', () => resolve()));

    expect(gateway.peers()).toEqual([{ address: peerAddress, inbound: false, connectedAt: expect.any(Number) }]);
    await expect(gateway.close()).resolves.toBeUndefined();
    for (const socket of accepted) socket.destroy();
  });

  it('rejects an address that is already being dialed', async () => {
    const gateway = await createGateway({ connectSocket: silentSocket, dialTimeoutMs: 60_000 });
    const first = gateway.connect('10.0.0.1:9981');
    const firstSettled = expect(first).rejects.toMatchObject({ code: 'ALREADY_STOPPED' });

    await expect(gateway.connect('10.0.0.1:9981')).rejects.toMatchObject({ code: 'PEER_ALREADY_CONNECTED' });

    await gateway.close();
    await firstSettled;
  });

  it('rejects an invalid address', async () => {
    const gateway = await createGateway();
    await expect(gateway.connect('nope')).rejects.toMatchObject({
      code: 'INVALID_ADDRESS',
      message: "Invalid address 'nope': expected host:port",
    });
  });

  it('fails a dial that exceeds the dial timeout with DIAL_TIMEOUT', async () => {
    const gateway = await createGateway({ connectSocket: silentSocket, dialTimeoutMs: 50 });
    await expect(gateway.connect('10.0.0.1:9981')).rejects.toMatchObject({
      code: 'DIAL_TIMEOUT',
      message: 'Dial to 10.0.0.1:9981 timed out after 50ms',
    });
    expect(gateway.peers()).toEqual([]);
  });

  it('fails a refused dial with DIAL_FAILED', async () => {
    const closed = await createGateway();
    const target = closed.address();
    await closed.close();

    const gateway = await createGateway();
    try {
      await gateway.connect(target);
      expect.fail('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(PoolNodeError);
      const poolErr = err as PoolNodeError;
      expect(poolErr.code).toBe('DIAL_FAILED');
      expect(poolErr.message.startsWith(`Failed to dial ${target}: `)).toBe(true);
    }
  });

  it('rejects dials beyond the fully-connected threshold', async () => {
    const gateway = await createGateway({ connectSocket: silentSocket, dialTimeoutMs: 60_000 });
    const threshold = GATEWAY_CONSTS.testing.fullyConnectedThreshold;

    const pending = Array.from({ length: threshold }, (_, i) =>
      expect(gateway.connect(`10.0.0.${i + 1}:9981`)).rejects.toMatchObject({ code: 'ALREADY_STOPPED' }),
    );

    await expect(gateway.connect('10.0.1.1:9981')).rejects.toMatchObject({
      code: 'PEER_LIMIT_REACHED',
      details: { limit: threshold },
    });

    await gateway.close();
    await Promise.all(pending);
  });

  it('disconnects a peer and rejects an unknown one', async () => {
    const a = await createGateway();
    const b = await createGateway();
    await a.connect(b.address());

    a.disconnect(b.address());
    expect(a.peers()).toEqual([]);
    await vi.waitFor(() => expect(b.peers()).toHaveLength(0));

    expect(() => a.disconnect(b.address())).toThrow(expect.objectContaining({ code: 'PEER_NOT_FOUND' }));
  });

  it('close drops every peer and rejects later connects', async () => {
    const a = await createGateway();
    const b = await createGateway();
    await a.connect(b.address());

    await a.close();
    expect(a.peers()).toEqual([]);
    await vi.waitFor(() => expect(b.peers()).toHaveLength(0));

    await expect(a.connect(b.address())).rejects.toMatchObject({ code: 'ALREADY_STOPPED' });
    await expect(a.close()).rejects.toMatchObject({ code: 'ALREADY_STOPPED' });
  });

  it('close interrupts an in-flight dial and waits for it', async () => {
    const gateway = await createGateway({ connectSocket: silentSocket, dialTimeoutMs: 60_000 });
    const started = Date.now();
    const dial = expect(gateway.connect('10.0.0.1:9981')).rejects.toMatchObject({ code: 'ALREADY_STOPPED' });

    await gateway.close();
    await dial;
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});
