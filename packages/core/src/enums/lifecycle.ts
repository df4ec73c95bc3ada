import { z } from 'zod';

/** Startup stages in construction order. Shutdown runs them in reverse. */
export const STARTUP_STAGES = ['network', 'chain-state', 'transaction-pool', 'serving', 'pool'] as const;
export type StartupStage = (typeof STARTUP_STAGES)[number];
export const StartupStageEnum = z.enum(STARTUP_STAGES);

export const ORCHESTRATOR_STATES = ['idle', 'constructing', 'running', 'stopped', 'failed'] as const;
export type OrchestratorState = (typeof ORCHESTRATOR_STATES)[number];
export const OrchestratorStateEnum = z.enum(ORCHESTRATOR_STATES);
