/**
 * Debug output gate. Startup and request lines go straight to console.log;
 * anything chattier goes through debugLog() and is printed only when
 * daemon.log_level is 'debug'.
 */

import type { LogLevel } from '@poolnode/core';

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}

export function debugLog(message: string): void {
  if (currentLevel === 'debug') {
    console.log(`[DEBUG] ${message}`);
  }
}
