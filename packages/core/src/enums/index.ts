export {
  STARTUP_STAGES,
  type StartupStage,
  StartupStageEnum,
  ORCHESTRATOR_STATES,
  type OrchestratorState,
  OrchestratorStateEnum,
} from './lifecycle.js';

export {
  BUILD_RELEASES,
  type BuildRelease,
  BuildReleaseEnum,
  LOG_LEVELS,
  type LogLevel,
  LogLevelEnum,
} from './release.js';
