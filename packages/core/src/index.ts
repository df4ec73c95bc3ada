// @poolnode/core - shared errors, enums, schemas, module contracts, shutdown primitive

// Enums
export {
  STARTUP_STAGES,
  type StartupStage,
  StartupStageEnum,
  ORCHESTRATOR_STATES,
  type OrchestratorState,
  OrchestratorStateEnum,
  BUILD_RELEASES,
  type BuildRelease,
  BuildReleaseEnum,
  LOG_LEVELS,
  type LogLevel,
  LogLevelEnum,
} from './enums/index.js';

// Errors
export {
  ERROR_CODES,
  type ErrorCode,
  type ErrorDomain,
  type ErrorCodeEntry,
  type ErrorHttpStatus,
  PoolNodeError,
  isPoolNodeError,
} from './errors/index.js';

// Schemas
export {
  Hash32Schema,
  TransactionInputSchema,
  type TransactionInput,
  TransactionOutputSchema,
  type TransactionOutput,
  PoolTransactionSchema,
  type PoolTransaction,
  PendingTransactionSchema,
  type PendingTransaction,
} from './schemas/index.js';

// Module contracts
export type {
  IManagedModule,
  PeerInfo,
  INetworkModule,
  IChainStateModule,
  ITransactionPoolModule,
  IServingModule,
  IPoolModule,
} from './interfaces/index.js';

// Shutdown coordination
export { ShutdownGroup, type StopHook, type ShutdownToken } from './sync/index.js';
