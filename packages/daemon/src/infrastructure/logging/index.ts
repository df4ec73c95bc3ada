export { setLogLevel, isDebugEnabled, debugLog } from './debug-log.js';
