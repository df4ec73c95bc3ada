export { createApp, DAEMON_VERSION, type CreateAppDeps } from './server.js';
export { ApiServer, type ApiServerDeps } from './api-server.js';
export type { ApiEnv } from './env.js';
