/**
 * Tests for ModuleOrchestrator: dependency-ordered construction, rollback on a
 * failing stage, shutdown during construction, and newest-first teardown.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PoolNodeError } from '@poolnode/core';
import { ModuleOrchestrator, type ModuleFactories } from '../lifecycle/orchestrator.js';
import { MockChainState, MockNetwork, MockPool, MockServing, MockTransactionPool } from './mocks/index.js';

type MockFactories = ModuleFactories<MockNetwork, MockChainState, MockTransactionPool, MockServing, MockPool>;

function setup() {
  const closeLog: string[] = [];
  const network = new MockNetwork(closeLog);
  const chainState = new MockChainState(closeLog);
  const tpool = new MockTransactionPool(closeLog);
  const serving = new MockServing(closeLog);
  const pool = new MockPool(closeLog);

  const factories = {
    network: vi.fn(async () => network),
    chainState: vi.fn(async (_deps: { network: MockNetwork }) => chainState),
    transactionPool: vi.fn(async (_deps: { network: MockNetwork; chainState: MockChainState }) => tpool),
    serving: vi.fn(
      async (_deps: { network: MockNetwork; chainState: MockChainState; transactionPool: MockTransactionPool }) =>
        serving,
    ),
    pool: vi.fn(async (_deps: { chainState: MockChainState }) => pool),
  } satisfies MockFactories;

  const log = vi.fn();
  const onRunning = vi.fn();
  const orchestrator = new ModuleOrchestrator(factories, {
    bootstrapPeers: ['a.test:9981', 'b.test:9981'],
    log,
    onRunning,
  });

  return { orchestrator, factories, network, chainState, tpool, serving, pool, closeLog, log, onRunning };
}

/** Settle a promise into a value so rejections can be inspected later. */
function settle<T>(promise: Promise<T>): Promise<{ ok: true; value: T } | { ok: false; error: unknown }> {
  return promise.then(
    (value) => ({ ok: true as const, value }),
    (error: unknown) => ({ ok: false as const, error }),
  );
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ModuleOrchestrator', () => {
  it('builds every stage in order, bootstraps, serves, and closes newest-first', async () => {
    const { orchestrator, factories, network, chainState, tpool, serving, pool, closeLog, log, onRunning } = setup();
    expect(orchestrator.state).toBe('idle');

    const started = orchestrator.start();
    await vi.waitFor(() => expect(orchestrator.state).toBe('running'));

    expect(factories.chainState).toHaveBeenCalledWith({ network });
    expect(factories.transactionPool).toHaveBeenCalledWith({ network, chainState });
    expect(factories.serving).toHaveBeenCalledWith({ network, chainState, transactionPool: tpool });
    expect(factories.pool).toHaveBeenCalledWith({ chainState });
    expect(orchestrator.liveStages).toEqual(['network', 'chain-state', 'transaction-pool', 'serving', 'pool']);
    expect(network.connect).toHaveBeenCalledTimes(2);
    expect(onRunning).toHaveBeenCalledTimes(1);
    expect(serving.serve).toHaveBeenCalledTimes(1);
    expect(pool.serve).toHaveBeenCalledTimes(1);

    await orchestrator.shutdown();
    await expect(started).resolves.toBeUndefined();

    expect(orchestrator.state).toBe('stopped');
    expect(orchestrator.liveStages).toEqual([]);
    expect(closeLog).toEqual(['pool', 'serving', 'transaction-pool', 'chain-state', 'network']);
    expect(log.mock.calls.map(([line]) => line)).toEqual([
      'Stage 1: network module ready',
      'Stage 2: chain-state module ready',
      'Stage 3: transaction-pool module ready',
      'Stage 4: serving module ready',
      'Stage 5: pool module ready',
      'pool module closed',
      'serving module closed',
      'transaction-pool module closed',
      'chain-state module closed',
      'network module closed',
    ]);
  });

  it('stops at a failing chain-state stage and closes the network module', async () => {
    const { orchestrator, factories, network, closeLog } = setup();
    factories.chainState.mockRejectedValueOnce(new Error('disk unreadable'));

    const result = await settle(orchestrator.start());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PoolNodeError);
      expect(result.error).toMatchObject({
        code: 'STAGE_CONSTRUCTION_FAILED',
        message: 'Failed to construct chain-state module: disk unreadable',
        details: { stage: 'chain-state' },
      });
      expect((result.error as PoolNodeError).cause).toEqual(new Error('disk unreadable'));
    }
    expect(factories.transactionPool).not.toHaveBeenCalled();
    expect(factories.serving).not.toHaveBeenCalled();
    expect(factories.pool).not.toHaveBeenCalled();
    expect(network.connect).not.toHaveBeenCalled();
    expect(closeLog).toEqual(['network']);
    expect(orchestrator.failedStage).toBe('chain-state');
    expect(orchestrator.state).toBe('failed');
  });

  it('rolls back every built stage in reverse order when serving fails', async () => {
    const { orchestrator, factories, closeLog } = setup();
    factories.serving.mockRejectedValueOnce(new Error('EADDRINUSE'));

    await expect(orchestrator.start()).rejects.toMatchObject({
      code: 'STAGE_CONSTRUCTION_FAILED',
      details: { stage: 'serving' },
    });
    expect(closeLog).toEqual(['transaction-pool', 'chain-state', 'network']);
    expect(orchestrator.failedStage).toBe('serving');
    expect(factories.pool).not.toHaveBeenCalled();
  });

  it('closes the serving module too when the pool listener cannot bind', async () => {
    const { orchestrator, factories, serving, closeLog } = setup();
    factories.pool.mockRejectedValueOnce(new Error('listen EADDRINUSE :::9985'));

    await expect(orchestrator.start()).rejects.toMatchObject({
      code: 'STAGE_CONSTRUCTION_FAILED',
      message: 'Failed to construct pool module: listen EADDRINUSE :::9985',
      details: { stage: 'pool' },
    });
    expect(closeLog).toEqual(['serving', 'transaction-pool', 'chain-state', 'network']);
    expect(serving.serve).not.toHaveBeenCalled();
    expect(orchestrator.failedStage).toBe('pool');
  });

  it('a failure in the first stage leaves nothing to close', async () => {
    const { orchestrator, factories, closeLog } = setup();
    factories.network.mockRejectedValueOnce('bind failed');

    await expect(orchestrator.start()).rejects.toMatchObject({
      message: 'Failed to construct network module: bind failed',
    });
    expect(closeLog).toEqual([]);
    expect(factories.chainState).not.toHaveBeenCalled();
  });

  it('shutdown during construction skips later stages and closes what was built', async () => {
    const { orchestrator, factories, chainState, closeLog, onRunning } = setup();
    let finishChainState: (m: MockChainState) => void = () => undefined;
    factories.chainState.mockImplementationOnce(
      () => new Promise<MockChainState>((resolve) => {
        finishChainState = resolve;
      }),
    );

    const started = orchestrator.start();
    await vi.waitFor(() => expect(factories.chainState).toHaveBeenCalled());

    const stopping = orchestrator.shutdown();
    finishChainState(chainState);

    await expect(started).resolves.toBeUndefined();
    await expect(stopping).resolves.toBeUndefined();
    expect(factories.transactionPool).not.toHaveBeenCalled();
    expect(onRunning).not.toHaveBeenCalled();
    expect(closeLog).toEqual(['chain-state', 'network']);
    expect(orchestrator.state).toBe('stopped');
  });

  it('ends the run and closes everything when serve() rejects', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { orchestrator, serving, closeLog } = setup();

    const started = settle(orchestrator.start());
    await vi.waitFor(() => expect(serving.serve).toHaveBeenCalled());
    serving.fail(new Error('listener died'));

    const result = await started;
    expect(result).toEqual({ ok: false, error: new Error('listener died') });
    expect(closeLog).toEqual(['pool', 'serving', 'transaction-pool', 'chain-state', 'network']);
    expect(orchestrator.state).toBe('failed');
  });

  it('ends the run when the pool listener fails while the API keeps serving', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { orchestrator, pool, closeLog } = setup();

    const started = settle(orchestrator.start());
    await vi.waitFor(() => expect(pool.serve).toHaveBeenCalled());
    pool.fail(new Error('pool listener died'));

    const result = await started;
    expect(result).toEqual({ ok: false, error: new Error('pool listener died') });
    expect(closeLog).toEqual(['pool', 'serving', 'transaction-pool', 'chain-state', 'network']);
    expect(orchestrator.state).toBe('failed');
  });

  it('closes every module even when one close fails, then reports it', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { orchestrator, chainState, closeLog } = setup();
    chainState.close.mockRejectedValueOnce(new Error('checkpoint failed'));

    const started = settle(orchestrator.start());
    await vi.waitFor(() => expect(orchestrator.state).toBe('running'));
    await orchestrator.shutdown();

    const result = await started;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AggregateError);
      expect((result.error as AggregateError).errors).toEqual([new Error('checkpoint failed')]);
    }
    expect(closeLog).toEqual(['pool', 'serving', 'transaction-pool', 'network']);
    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(orchestrator.state).toBe('stopped');
  });

  it('ignores a module that was already closed', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { orchestrator, tpool, closeLog } = setup();
    tpool.close.mockRejectedValueOnce(new PoolNodeError('ALREADY_STOPPED'));

    const started = orchestrator.start();
    await vi.waitFor(() => expect(orchestrator.state).toBe('running'));
    await orchestrator.shutdown();

    await expect(started).resolves.toBeUndefined();
    expect(closeLog).toEqual(['pool', 'serving', 'chain-state', 'network']);
    expect(consoleError).not.toHaveBeenCalled();
    expect(orchestrator.state).toBe('stopped');
  });

  it('does not wait on serve() when the serving module fails to close', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { orchestrator, serving, closeLog } = setup();
    serving.close.mockRejectedValueOnce(new Error('socket stuck'));

    const started = settle(orchestrator.start());
    await vi.waitFor(() => expect(orchestrator.state).toBe('running'));
    await orchestrator.shutdown();

    const result = await started;
    expect(result.ok).toBe(false);
    expect(closeLog).toEqual(['pool', 'transaction-pool', 'chain-state', 'network']);
  });

  it('start after shutdown rejects with ALREADY_STOPPED without building anything', async () => {
    const { orchestrator, factories } = setup();
    await orchestrator.shutdown();

    await expect(orchestrator.start()).rejects.toMatchObject({ code: 'ALREADY_STOPPED' });
    expect(factories.network).not.toHaveBeenCalled();
  });

  it('rejects a second start', async () => {
    const { orchestrator } = setup();
    const started = orchestrator.start();
    await vi.waitFor(() => expect(orchestrator.state).toBe('running'));

    await expect(orchestrator.start()).rejects.toThrow("ModuleOrchestrator.start() called in state 'running'");

    await orchestrator.shutdown();
    await started;
  });

  it('repeated shutdown calls share one shutdown', async () => {
    const { orchestrator } = setup();
    const started = orchestrator.start();
    await vi.waitFor(() => expect(orchestrator.state).toBe('running'));

    const first = orchestrator.shutdown();
    expect(orchestrator.shutdown()).toBe(first);
    await first;
    await started;
  });
});
