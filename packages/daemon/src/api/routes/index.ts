export { daemonRoutes, type DaemonRouteDeps } from './daemon.js';
export { consensusRoutes } from './consensus.js';
export { gatewayRoutes } from './gateway.js';
export { tpoolRoutes } from './tpool.js';
export { openApiValidationHook } from './openapi-schemas.js';
