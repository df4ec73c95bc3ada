export { PoolServer } from './pool-server.js';
export type { PoolServerOptions } from './pool-server.js';
export { createPoolApp } from './pool-app.js';
export type { PoolAppDeps } from './pool-app.js';
