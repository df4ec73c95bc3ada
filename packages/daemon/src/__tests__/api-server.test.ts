/**
 * Tests for the Hono API: middleware, routes and error mapping via app.request(),
 * plus the ApiServer serving module over a real loopback listener.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PoolNodeError, type PendingTransaction } from '@poolnode/core';
import { createApp, DAEMON_VERSION, ApiServer, type CreateAppDeps } from '../api/index.js';
import { MockChainState, MockNetwork, MockTransactionPool } from './mocks/index.js';

const AGENT = 'Poolnode-Agent';
const HEADERS = { 'User-Agent': `${AGENT}/0.1.0` };

function createTestApp(overrides: Partial<CreateAppDeps> = {}) {
  const consensus = new MockChainState();
  const gateway = new MockNetwork();
  const tpool = new MockTransactionPool();
  const log = vi.fn();
  const app = createApp({ userAgent: AGENT, release: 'testing', consensus, gateway, tpool, log, ...overrides });
  return { app, consensus, gateway, tpool, log };
}

/** Type-safe JSON body extraction from Response. */
async function json(res: Response): Promise<Record<string, unknown>> {
  return (await res.json()) as Record<string, unknown>;
}

const TX = {
  inputs: [{ parentId: '11'.repeat(32), unlockHash: '22'.repeat(32) }],
  outputs: [{ value: '5', unlockHash: '33'.repeat(32) }],
};

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

describe('requestId middleware', () => {
  it('echoes a client-provided X-Request-Id', async () => {
    const { app } = createTestApp();
    const res = await app.request('/daemon/version', { headers: { ...HEADERS, 'X-Request-Id': 'req-1' } });
    expect(res.headers.get('X-Request-Id')).toBe('req-1');
  });

  it('generates a UUID when none is provided', async () => {
    const { app } = createTestApp();
    const res = await app.request('/daemon/version', { headers: HEADERS });
    expect(res.headers.get('X-Request-Id')).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('agent guard', () => {
  it('rejects requests without the agent string', async () => {
    const { app } = createTestApp();
    const res = await app.request('/daemon/version', {
      headers: { 'User-Agent': 'Mozilla/5.0', 'X-Request-Id': 'req-2' },
    });

    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({
      code: 'BROWSER_ACCESS_DISABLED',
      message: "Browser access disabled: User-Agent must contain 'Poolnode-Agent'",
      retryable: false,
      requestId: 'req-2',
    });
  });

  it('rejects requests with no User-Agent at all', async () => {
    const { app } = createTestApp();
    const res = await app.request('/daemon/version');
    expect(res.status).toBe(400);
  });
});

describe('ready guard', () => {
  it('answers 503 API_NOT_READY until ready', async () => {
    let ready = false;
    const { app } = createTestApp({ isReady: () => ready });

    const before = await app.request('/daemon/version', { headers: HEADERS });
    expect(before.status).toBe(503);
    expect((await json(before)).code).toBe('API_NOT_READY');

    ready = true;
    const after = await app.request('/daemon/version', { headers: HEADERS });
    expect(after.status).toBe(200);
  });
});

describe('request logger', () => {
  it('logs one line per request', async () => {
    const { app, log } = createTestApp();
    await app.request('/consensus', { headers: HEADERS });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toMatch(/^\[REQ\] GET \/consensus 200 \d+ms$/);
  });
});

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

describe('daemon routes', () => {
  it('GET /daemon/version returns version and release', async () => {
    const { app } = createTestApp();
    const res = await app.request('/daemon/version', { headers: HEADERS });
    expect(await json(res)).toEqual({ version: DAEMON_VERSION, release: 'testing' });
    expect(DAEMON_VERSION).toBe('0.1.0');
  });

  it('POST /daemon/stop responds first, then requests shutdown', async () => {
    const requestShutdown = vi.fn();
    const { app } = createTestApp({ requestShutdown });

    const res = await app.request('/daemon/stop', { method: 'POST', headers: HEADERS });
    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ message: 'Shutdown initiated' });
    await vi.waitFor(() => expect(requestShutdown).toHaveBeenCalledTimes(1));
  });

  it('GET /doc serves the OpenAPI document', async () => {
    const { app } = createTestApp();
    const res = await app.request('/doc', { headers: HEADERS });
    const doc = await json(res);
    expect(doc.openapi).toBe('3.0.0');
    expect(Object.keys(doc.paths as Record<string, unknown>)).toEqual(
      expect.arrayContaining([
        '/daemon/version',
        '/consensus',
        '/consensus/blocks/{height}',
        '/gateway',
        '/tpool/transactions',
      ]),
    );
  });
});

describe('consensus routes', () => {
  it('GET /consensus reports height, tip and genesis', async () => {
    const { app } = createTestApp();
    const res = await app.request('/consensus', { headers: HEADERS });
    expect(await json(res)).toEqual({ height: 7, currentBlock: 'ab'.repeat(32), genesisId: '00'.repeat(32) });
  });

  it('GET /consensus/blocks/{height} returns the block id on the current path', async () => {
    const { app, consensus } = createTestApp();
    const res = await app.request('/consensus/blocks/0', { headers: HEADERS });

    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ height: 0, blockId: '00'.repeat(32) });
    expect(consensus.blockIdAt).toHaveBeenCalledWith(0);
  });

  it('GET /consensus/blocks/{height} answers 404 BLOCK_NOT_FOUND past the tip', async () => {
    const { app } = createTestApp();
    const res = await app.request('/consensus/blocks/8', { headers: HEADERS });

    expect(res.status).toBe(404);
    const body = await json(res);
    expect(body.code).toBe('BLOCK_NOT_FOUND');
    expect(body.details).toEqual({ height: 8 });
  });

  it('rejects a height that is not a non-negative integer', async () => {
    const { app, consensus } = createTestApp();
    const res = await app.request('/consensus/blocks/-1', { headers: HEADERS });

    expect(res.status).toBe(400);
    expect((await json(res)).code).toBe('VALIDATION_FAILED');
    expect(consensus.blockIdAt).not.toHaveBeenCalled();
  });

  it('is not mounted without a consensus module', async () => {
    const { app } = createTestApp({ consensus: undefined });
    const res = await app.request('/consensus', { headers: HEADERS });
    expect(res.status).toBe(404);
  });
});

describe('gateway routes', () => {
  it('GET /gateway lists the address and peers', async () => {
    const { app, gateway } = createTestApp();
    gateway.connected.push('10.0.0.1:9981');

    const res = await app.request('/gateway', { headers: HEADERS });
    expect(await json(res)).toEqual({
      netAddress: '127.0.0.1:9981',
      peers: [{ address: '10.0.0.1:9981', inbound: false, connectedAt: 1_700_000_000_000 }],
    });
  });

  it('POST /gateway/connect/{address} dials the peer', async () => {
    const { app, gateway } = createTestApp();
    const res = await app.request('/gateway/connect/10.0.0.2:9981', { method: 'POST', headers: HEADERS });

    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ success: true, address: '10.0.0.2:9981' });
    expect(gateway.connect).toHaveBeenCalledWith('10.0.0.2:9981');
  });

  it('maps a dial error to its HTTP status', async () => {
    const { app, gateway } = createTestApp();
    gateway.connect.mockRejectedValueOnce(new PoolNodeError('DIAL_TIMEOUT'));

    const res = await app.request('/gateway/connect/10.0.0.2:9981', { method: 'POST', headers: HEADERS });
    expect(res.status).toBe(504);
    expect((await json(res)).code).toBe('DIAL_TIMEOUT');
  });

  it('POST /gateway/disconnect/{address} maps PEER_NOT_FOUND to 404', async () => {
    const { app, gateway } = createTestApp();
    gateway.disconnect.mockImplementationOnce(() => {
      throw new PoolNodeError('PEER_NOT_FOUND', { details: { address: '10.0.0.3:9981' } });
    });

    const res = await app.request('/gateway/disconnect/10.0.0.3:9981', { method: 'POST', headers: HEADERS });
    expect(res.status).toBe(404);
    expect((await json(res)).details).toEqual({ address: '10.0.0.3:9981' });
  });
});

describe('tpool routes', () => {
  it('POST /tpool/transactions returns 201 with the pending entry', async () => {
    const { app, tpool } = createTestApp();
    const entry: PendingTransaction = {
      id: 'cd'.repeat(32),
      transaction: { ...TX, minerFees: [] },
      seenAtHeight: 7,
      receivedAt: 1_700_000_000_000,
    };
    tpool.acceptTransaction.mockReturnValueOnce(entry);

    const res = await app.request('/tpool/transactions', {
      method: 'POST',
      headers: { ...HEADERS, 'Content-Type': 'application/json' },
      body: JSON.stringify(TX),
    });

    expect(res.status).toBe(201);
    expect(await json(res)).toEqual(entry);
    expect(tpool.acceptTransaction).toHaveBeenCalledWith({ ...TX, minerFees: [] });
  });

  it('rejects an invalid body with 400 VALIDATION_FAILED before reaching the pool', async () => {
    const { app, tpool } = createTestApp();
    const res = await app.request('/tpool/transactions', {
      method: 'POST',
      headers: { ...HEADERS, 'Content-Type': 'application/json' },
      body: JSON.stringify({ inputs: [], outputs: [] }),
    });

    expect(res.status).toBe(400);
    expect((await json(res)).code).toBe('VALIDATION_FAILED');
    expect(tpool.acceptTransaction).not.toHaveBeenCalled();
  });

  it('maps TRANSACTION_DUPLICATE to 409', async () => {
    const { app, tpool } = createTestApp();
    tpool.acceptTransaction.mockImplementationOnce(() => {
      throw new PoolNodeError('TRANSACTION_DUPLICATE');
    });

    const res = await app.request('/tpool/transactions', {
      method: 'POST',
      headers: { ...HEADERS, 'Content-Type': 'application/json' },
      body: JSON.stringify(TX),
    });
    expect(res.status).toBe(409);
  });

  it('GET /tpool/transactions lists pending entries', async () => {
    const { app } = createTestApp();
    const res = await app.request('/tpool/transactions', { headers: HEADERS });
    expect(await json(res)).toEqual({ count: 0, transactions: [] });
  });

  it('DELETE /tpool/transactions purges the pool and reports the count', async () => {
    const { app, tpool } = createTestApp();
    const entry: PendingTransaction = {
      id: 'ef'.repeat(32),
      transaction: { ...TX, minerFees: [] },
      seenAtHeight: 7,
      receivedAt: 1_700_000_000_000,
    };
    tpool.pending.push(entry, { ...entry, id: 'fe'.repeat(32) });

    const res = await app.request('/tpool/transactions', { method: 'DELETE', headers: HEADERS });
    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ purged: 2 });
    expect(tpool.purge).toHaveBeenCalledTimes(1);
    expect(tpool.size).toBe(0);
  });
});

describe('error handler', () => {
  it('maps an unexpected error to 500 INTERNAL_ERROR', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { app, consensus } = createTestApp();
    consensus.height.mockImplementationOnce(() => {
      throw new Error('store unavailable');
    });

    const res = await app.request('/consensus', { headers: { ...HEADERS, 'X-Request-Id': 'req-3' } });
    expect(res.status).toBe(500);
    expect(await json(res)).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'store unavailable',
      requestId: 'req-3',
      retryable: false,
    });
  });

  it('falls back to the table message when the error has none', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { app, consensus } = createTestApp();
    consensus.height.mockImplementationOnce(() => {
      throw new Error('');
    });

    const res = await app.request('/consensus', { headers: { ...HEADERS, 'X-Request-Id': 'req-4' } });
    expect(res.status).toBe(500);
    expect(await json(res)).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      requestId: 'req-4',
      retryable: false,
    });
  });
});

// ---------------------------------------------------------------------------
// ApiServer
// ---------------------------------------------------------------------------

describe('ApiServer', () => {
  async function createServer(): Promise<ApiServer> {
    return ApiServer.create({
      addr: '127.0.0.1:0',
      userAgent: AGENT,
      release: 'testing',
      consensus: new MockChainState(),
      gateway: new MockNetwork(),
      tpool: new MockTransactionPool(),
    });
  }

  it('binds at construction but refuses requests until serve()', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const server = await createServer();
    const url = `http://${server.address()}/consensus`;

    const before = await fetch(url, { headers: HEADERS });
    expect(before.status).toBe(503);

    const serving = server.serve();
    const after = await fetch(url, { headers: HEADERS });
    expect(after.status).toBe(200);

    await server.close();
    await expect(serving).resolves.toBeUndefined();
  });

  it('fails construction when the address is in use', async () => {
    const first = await createServer();
    await expect(
      ApiServer.create({
        addr: first.address(),
        userAgent: AGENT,
        release: 'testing',
        consensus: new MockChainState(),
        gateway: new MockNetwork(),
        tpool: new MockTransactionPool(),
      }),
    ).rejects.toMatchObject({ code: 'EADDRINUSE' });
    await first.close();
  });

  it('serve() after close resolves without accepting', async () => {
    const server = await createServer();
    await server.close();
    await expect(server.serve()).resolves.toBeUndefined();
    await expect(server.close()).rejects.toMatchObject({ code: 'ALREADY_STOPPED' });
  });
});
