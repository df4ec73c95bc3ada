export { ShutdownGroup, type StopHook, type ShutdownToken } from './shutdown-group.js';
