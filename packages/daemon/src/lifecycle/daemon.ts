/**
 * DaemonLifecycle - daemon startup (3 steps) and shutdown.
 *
 * Startup sequence:
 *   1. Config + daemon lock (5s timeout, fail-fast)
 *   2. PID file
 *   3. ModuleOrchestrator.start(): gateway, consensus, tpool, api, pool,
 *      bootstrap, then serve until shutdown
 * PID file and lock are released when step 3 returns, however it returns.
 *
 * Shutdown:
 *   1. Set isShuttingDown, start force timer, log signal
 *   2. orchestrator.shutdown() (modules close newest-first and drain)
 *   3. Cancel force timer
 */

import { writeFileSync, unlinkSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { lock } from 'proper-lockfile';
import { PoolNodeError, type OrchestratorState } from '@poolnode/core';
import { loadConfig, type ConfigOverrides, type DaemonConfig } from '../infrastructure/config/index.js';
import { debugLog, setLogLevel } from '../infrastructure/logging/index.js';
import { ModuleOrchestrator } from './orchestrator.js';
import { createModuleFactories } from './module-factories.js';
import type { Gateway } from '../modules/gateway/index.js';
import type { ConsensusSet } from '../modules/consensus/index.js';
import type { TransactionPool } from '../modules/transactionpool/index.js';
import type { PoolServer } from '../modules/pool/index.js';
import type { ApiServer } from '../api/api-server.js';

type DaemonOrchestrator = ModuleOrchestrator<Gateway, ConsensusSet, TransactionPool, ApiServer, PoolServer>;

// ---------------------------------------------------------------------------
// Timeout utility
// ---------------------------------------------------------------------------

/**
 * Race a promise against a timeout. Rejects with OPERATION_TIMEOUT on timeout.
 */
function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(
        new PoolNodeError('OPERATION_TIMEOUT', {
          message: `${label}: Timeout after ${ms}ms`,
          details: { label, timeoutMs: ms },
        }),
      );
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// Export for testing
export { withTimeout };

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

// ---------------------------------------------------------------------------
// DaemonLifecycle
// ---------------------------------------------------------------------------

export class DaemonLifecycle {
  private _isShuttingDown = false;
  private _config: DaemonConfig | null = null;
  private orchestrator: DaemonOrchestrator | null = null;
  private releaseLock: (() => Promise<void>) | null = null;
  private pidPath = '';
  private forceTimer: ReturnType<typeof setTimeout> | null = null;

  /** Whether shutdown has been initiated. */
  get isShuttingDown(): boolean {
    return this._isShuttingDown;
  }

  /** Current config (available after start). */
  get config(): DaemonConfig | null {
    return this._config;
  }

  get state(): OrchestratorState {
    return this.orchestrator?.state ?? 'idle';
  }

  /**
   * Run the daemon. Resolves after a requested shutdown has drained every
   * module; rejects if startup fails.
   */
  async start(dataDir: string, overrides: ConfigOverrides = {}): Promise<void> {
    // ------------------------------------------------------------------
    // Step 1: Config + daemon lock (5s, fail-fast)
    // ------------------------------------------------------------------
    await withTimeout(
      (async () => {
        if (!existsSync(dataDir)) {
          mkdirSync(dataDir, { recursive: true, mode: 0o700 });
        }
        this._config = loadConfig(dataDir, overrides);
        setLogLevel(this._config.daemon.log_level);
        await this.acquireDaemonLock(dataDir);
      })(),
      5_000,
      'STEP1_CONFIG_LOCK',
    );
    const config = this.requireConfig();
    console.log(`Step 1: Config loaded (release ${config.daemon.release}), daemon lock acquired`);

    try {
      // ------------------------------------------------------------------
      // Step 2: PID file
      // ------------------------------------------------------------------
      this.pidPath = join(dataDir, config.daemon.pid_file);
      writeFileSync(this.pidPath, String(process.pid), 'utf-8');
      console.log(`Step 2: PID file written (PID: ${process.pid})`);

      // ------------------------------------------------------------------
      // Step 3: Modules, bootstrap, serve
      // ------------------------------------------------------------------
      const factories = createModuleFactories(dataDir, config, () => {
        void this.shutdown('POST /daemon/stop');
      });

      const orchestrator = new ModuleOrchestrator(factories, {
        bootstrapPeers: config.gateway.bootstrap_peers,
        bootstrap: {
          count: config.gateway.bootstrap_count,
          onDialError: (address, err) =>
            debugLog(`bootstrap dial to ${address} failed: ${err instanceof Error ? err.message : String(err)}`),
        },
        log: (message) => console.log(`Step 3: ${message}`),
        onRunning: () => console.log(`poolnode daemon ready (PID: ${process.pid})`),
      });
      this.orchestrator = orchestrator;

      if (this._isShuttingDown) {
        console.log('Shutdown requested before modules started');
        return;
      }
      await orchestrator.start();
    } finally {
      await this.releaseResources();
    }
  }

  /**
   * Graceful shutdown. Only the first call has any effect.
   */
  async shutdown(signal: string): Promise<void> {
    if (this._isShuttingDown) return;
    this._isShuttingDown = true;

    console.log(`Shutdown initiated by ${signal}`);

    // Force-exit timer (configurable, default 30s)
    const timeout = this._config?.daemon.shutdown_timeout ?? 30;
    this.forceTimer = setTimeout(() => {
      console.error('Force exit: shutdown timeout exceeded');
      process.exit(1);
    }, timeout * 1000);
    this.forceTimer.unref();

    try {
      if (this.orchestrator) {
        await this.orchestrator.shutdown();
      }
      console.log('Shutdown complete');
    } catch (err) {
      console.error('Shutdown error:', err);
    } finally {
      if (this.forceTimer) {
        clearTimeout(this.forceTimer);
        this.forceTimer = null;
      }
    }
  }

  // -------------------------------------------------------------------------

  private requireConfig(): DaemonConfig {
    if (!this._config) {
      throw new Error('DaemonLifecycle: config not loaded');
    }
    return this._config;
  }

  /** Remove PID file and release the daemon lock. */
  private async releaseResources(): Promise<void> {
    if (this.pidPath && existsSync(this.pidPath)) {
      unlinkSync(this.pidPath);
    }
    this.pidPath = '';

    if (this.releaseLock) {
      const release = this.releaseLock;
      this.releaseLock = null;
      try {
        await release();
      } catch (err) {
        console.warn('Failed to release daemon lock:', err);
      }
    }
  }

  /**
   * Acquire an exclusive daemon lock to prevent multiple instances.
   * Uses proper-lockfile for cross-platform support.
   */
  private async acquireDaemonLock(dataDir: string): Promise<void> {
    const lockPath = join(dataDir, 'daemon.lock');

    // proper-lockfile requires the target file to exist
    if (!existsSync(lockPath)) {
      writeFileSync(lockPath, '', 'utf-8');
    }

    try {
      this.releaseLock = await lock(lockPath, {
        stale: 10_000, // Consider lock stale after 10s without update
        update: 5_000, // Update lock mtime every 5s
        retries: 0, // No retries -- fail immediately if locked
        onCompromised: (err) => console.error('Daemon lock compromised:', err.message),
      });
    } catch (err) {
      if (errorCode(err) === 'ELOCKED') {
        throw new PoolNodeError('DAEMON_ALREADY_RUNNING', {
          message: 'Another poolnode daemon is already running (daemon.lock is held)',
          details: { lockPath },
          cause: err,
        });
      }
      throw err;
    }
  }
}
