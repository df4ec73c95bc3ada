/**
 * ModuleOrchestrator - constructs the five daemon modules in dependency order
 * and runs the two listeners until shutdown.
 *
 * Stages (STARTUP_STAGES):
 *   1. network           - factory()
 *   2. chain-state       - factory({ network })
 *   3. transaction-pool  - factory({ network, chainState })
 *   4. serving           - factory({ network, chainState, transactionPool })
 *   5. pool              - factory({ chainState })
 *
 * Stage k+1 starts only after stage k succeeded. A failure stops the sequence,
 * closes the stages already built (newest first) and rejects start() with
 * STAGE_CONSTRUCTION_FAILED naming the stage. Once running, the bootstrap
 * joiner fires once and start() waits on serve() of the serving and pool
 * modules. Either one ending ends the run.
 *
 * shutdown() stops the orchestrator's ShutdownGroup; start() then closes every
 * module in reverse construction order and resolves.
 */

import {
  PoolNodeError,
  ShutdownGroup,
  isPoolNodeError,
  type IChainStateModule,
  type INetworkModule,
  type IServingModule,
  type ITransactionPoolModule,
  type IManagedModule,
  type IPoolModule,
  type OrchestratorState,
  type StartupStage,
} from '@poolnode/core';
import { joinBootstrapPeers, type BootstrapOptions } from './bootstrap.js';

export interface ModuleFactories<
  N extends INetworkModule = INetworkModule,
  C extends IChainStateModule = IChainStateModule,
  T extends ITransactionPoolModule = ITransactionPoolModule,
  S extends IServingModule = IServingModule,
  P extends IPoolModule = IPoolModule,
> {
  network: () => Promise<N>;
  chainState: (deps: { network: N }) => Promise<C>;
  transactionPool: (deps: { network: N; chainState: C }) => Promise<T>;
  serving: (deps: { network: N; chainState: C; transactionPool: T }) => Promise<S>;
  pool: (deps: { chainState: C }) => Promise<P>;
}

export interface OrchestratorOptions {
  bootstrapPeers: readonly string[];
  bootstrap?: BootstrapOptions;
  /** Progress lines (e.g. console.log). */
  log?: (message: string) => void;
  /** Called once all stages are up, after bootstrap and before serving. */
  onRunning?: () => void;
}

type Outcome = { ok: true } | { ok: false; error: unknown };

interface ConstructedModule {
  stage: StartupStage;
  module: IManagedModule;
}

export class ModuleOrchestrator<
  N extends INetworkModule = INetworkModule,
  C extends IChainStateModule = IChainStateModule,
  T extends ITransactionPoolModule = ITransactionPoolModule,
  S extends IServingModule = IServingModule,
  P extends IPoolModule = IPoolModule,
> {
  private readonly tg = new ShutdownGroup();
  private readonly constructed: ConstructedModule[] = [];
  private _state: OrchestratorState = 'idle';
  private _failedStage: StartupStage | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(
    private readonly factories: ModuleFactories<N, C, T, S, P>,
    private readonly options: OrchestratorOptions,
  ) {}

  get state(): OrchestratorState {
    return this._state;
  }

  get failedStage(): StartupStage | null {
    return this._failedStage;
  }

  /** Stages built and not yet closed, in construction order. */
  get liveStages(): StartupStage[] {
    return this.constructed.map((m) => m.stage);
  }

  /**
   * Construct every stage, bootstrap, then serve until shutdown.
   *
   * @throws PoolNodeError STAGE_CONSTRUCTION_FAILED when a stage fails to build
   * @throws PoolNodeError ALREADY_STOPPED if shutdown() was called before start()
   */
  async start(): Promise<void> {
    if (this._state !== 'idle') {
      throw new Error(`ModuleOrchestrator.start() called in state '${this._state}'`);
    }
    const token = this.tg.acquire();
    this._state = 'constructing';

    let outcome: Outcome = { ok: true };
    let served: Promise<Outcome> | null = null;
    try {
      const built = await this.constructAll();
      if (built !== null && !this.tg.isStopped()) {
        this._state = 'running';
        joinBootstrapPeers(built.network, this.options.bootstrapPeers, this.options.bootstrap);
        this.options.onRunning?.();

        const serves = [built.serving, built.pool].map((listener) =>
          listener.serve().then(
            (): Outcome => ({ ok: true }),
            (error: unknown): Outcome => ({ ok: false, error }),
          ),
        );
        served = Promise.all(serves).then(
          (outcomes): Outcome => outcomes.find((o) => !o.ok) ?? { ok: true },
        );
        // A listener ending by itself or a shutdown request ends the run.
        await Promise.race([...serves, this.tg.whenStopped()]);
      }
    } catch (err) {
      outcome = { ok: false, error: err };
    }

    const closeErrors = await this.closeConstructed();
    // A listener that failed to close may never settle serve()
    if (served !== null && outcome.ok && closeErrors.length === 0) {
      outcome = await served;
    }
    this.tg.release(token);

    if (!outcome.ok) {
      this._state = 'failed';
      throw outcome.error;
    }
    this._state = 'stopped';
    if (closeErrors.length > 0) {
      throw new AggregateError(closeErrors, 'one or more modules failed to close');
    }
  }

  /**
   * Request shutdown. Resolves once start() has closed every module.
   * Repeated calls share the same shutdown.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.tg.stop();
    return this.shutdownPromise;
  }

  // -------------------------------------------------------------------------

  /** Returns null when a shutdown interrupted construction. */
  private async constructAll(): Promise<{ network: N; serving: S; pool: P } | null> {
    const network = await this.stage('network', () => this.factories.network());
    if (network === null) return null;

    const chainState = await this.stage('chain-state', () => this.factories.chainState({ network }));
    if (chainState === null) return null;

    const transactionPool = await this.stage('transaction-pool', () =>
      this.factories.transactionPool({ network, chainState }),
    );
    if (transactionPool === null) return null;

    const serving = await this.stage('serving', () =>
      this.factories.serving({ network, chainState, transactionPool }),
    );
    if (serving === null) return null;

    const pool = await this.stage('pool', () => this.factories.pool({ chainState }));
    if (pool === null) return null;

    return { network, serving, pool };
  }

  private async stage<M extends IManagedModule>(
    stage: StartupStage,
    build: () => Promise<M>,
  ): Promise<M | null> {
    if (this.tg.isStopped()) return null;

    let module: M;
    try {
      module = await build();
    } catch (err) {
      this._failedStage = stage;
      const reason = err instanceof Error ? err.message : String(err);
      throw new PoolNodeError('STAGE_CONSTRUCTION_FAILED', {
        message: `Failed to construct ${stage} module: ${reason}`,
        details: { stage },
        cause: err,
      });
    }

    this.constructed.push({ stage, module });
    this.options.log?.(`Stage ${this.constructed.length}: ${stage} module ready`);
    return module;
  }

  /** Close constructed modules newest-first. A failing close does not skip the rest. */
  private async closeConstructed(): Promise<unknown[]> {
    const errors: unknown[] = [];
    for (let entry = this.constructed.pop(); entry; entry = this.constructed.pop()) {
      try {
        await entry.module.close();
        this.options.log?.(`${entry.stage} module closed`);
      } catch (err) {
        if (isPoolNodeError(err, 'ALREADY_STOPPED')) continue;
        console.error(`Failed to close ${entry.stage} module:`, err);
        errors.push(err);
      }
    }
    return errors;
  }
}
