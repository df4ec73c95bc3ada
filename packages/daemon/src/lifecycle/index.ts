/**
 * Lifecycle module barrel export.
 *
 * Re-exports DaemonLifecycle, the orchestrator, bootstrap joiner, and signal handler.
 */

export { DaemonLifecycle, withTimeout } from './daemon.js';
export { ModuleOrchestrator, type ModuleFactories, type OrchestratorOptions } from './orchestrator.js';
export { createModuleFactories, type DaemonModuleFactories } from './module-factories.js';
export {
  joinBootstrapPeers,
  randomPermutation,
  DEFAULT_BOOTSTRAP_COUNT,
  type BootstrapOptions,
} from './bootstrap.js';
export { registerSignalHandlers } from './signal-handler.js';
