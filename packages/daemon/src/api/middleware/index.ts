/**
 * Barrel export: global middleware + error handler.
 */

export { requestId } from './request-id.js';
export { createRequestLogger } from './request-logger.js';
export { createAgentGuard } from './agent-guard.js';
export { createReadyGuard, type IsReady } from './ready-guard.js';
export { errorHandler } from './error-handler.js';
