// @poolnode/daemon - daemon modules, orchestration and lifecycle

// Config module
export {
  loadConfig,
  DaemonConfigSchema,
  detectNestedSections,
  applyEnvOverrides,
  applyOverrides,
  parseEnvValue,
} from './infrastructure/config/index.js';
export type { DaemonConfig, ConfigOverrides } from './infrastructure/config/index.js';

// Database module
export {
  openStore,
  closeStore,
  pushSchema,
  loadPersistedState,
  markInconsistent,
} from './infrastructure/database/index.js';
export type { StoreConnection, IntegrityGate, LoadResult } from './infrastructure/database/index.js';

// Modules
export {
  Gateway,
  BOOTSTRAP_PEERS,
  GATEWAY_CONSTS,
  parseNetAddress,
  formatNetAddress,
} from './modules/gateway/index.js';
export type { GatewayOptions, NetAddress } from './modules/gateway/index.js';
export { ConsensusSet, genesisId } from './modules/consensus/index.js';
export type { ConsensusSetOptions } from './modules/consensus/index.js';
export { TransactionPool } from './modules/transactionpool/index.js';
export type { TransactionPoolOptions } from './modules/transactionpool/index.js';
export { PoolServer, createPoolApp } from './modules/pool/index.js';
export type { PoolServerOptions, PoolAppDeps } from './modules/pool/index.js';

// API module
export { createApp, ApiServer, DAEMON_VERSION } from './api/index.js';
export type { CreateAppDeps, ApiServerDeps } from './api/index.js';

// Lifecycle module
export {
  DaemonLifecycle,
  withTimeout,
  ModuleOrchestrator,
  createModuleFactories,
  joinBootstrapPeers,
  registerSignalHandlers,
} from './lifecycle/index.js';
export type { ModuleFactories, OrchestratorOptions, BootstrapOptions } from './lifecycle/index.js';

// ---------------------------------------------------------------------------
// Convenience: top-level startDaemon()
// ---------------------------------------------------------------------------

import { DaemonLifecycle } from './lifecycle/index.js';
import { registerSignalHandlers } from './lifecycle/index.js';
import type { ConfigOverrides } from './infrastructure/config/index.js';

/**
 * Run the poolnode daemon until it is shut down.
 *
 * Creates a DaemonLifecycle, registers signal handlers, and starts the daemon
 * with the given data directory. Resolves after a clean shutdown; rejects when
 * startup fails (the error names the failing stage).
 *
 * @param dataDir - Path to the data directory (config.toml, daemon.pid, module dirs)
 * @param overrides - Config values taken from CLI flags
 */
export async function startDaemon(dataDir: string, overrides: ConfigOverrides = {}): Promise<DaemonLifecycle> {
  const daemon = new DaemonLifecycle();
  const unregister = registerSignalHandlers(daemon);
  try {
    await daemon.start(dataDir, overrides);
  } finally {
    unregister();
  }
  return daemon;
}
