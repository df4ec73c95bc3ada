/**
 * Signal handler registration for daemon graceful shutdown.
 *
 * Wires SIGINT, SIGTERM, and (on Windows) SIGBREAK to DaemonLifecycle.shutdown().
 * Also handles uncaughtException and unhandledRejection as last-resort shutdown triggers.
 */

import type { DaemonLifecycle } from './daemon.js';

type ShutdownTarget = Pick<DaemonLifecycle, 'shutdown'>;

/**
 * Register process signal handlers for graceful daemon shutdown.
 *
 * - SIGINT: Ctrl-C
 * - SIGTERM: kill / systemd stop / `poolnode stop`
 * - SIGBREAK: Windows Ctrl-Break (only on win32)
 * - uncaughtException: last-resort shutdown + exit(1)
 * - unhandledRejection: last-resort shutdown + exit(1)
 *
 * Returns a function that removes every handler it added.
 */
export function registerSignalHandlers(daemon: ShutdownTarget, proc: NodeJS.Process = process): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    void daemon.shutdown(signal);
  };
  const onFatal = (label: string) => (reason: unknown) => {
    console.error(`${label}:`, reason);
    void daemon.shutdown(label).finally(() => proc.exit(1));
  };
  const onUncaught = onFatal('uncaughtException');
  const onUnhandled = onFatal('unhandledRejection');

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  if (proc.platform === 'win32') {
    signals.push('SIGBREAK');
  }

  for (const signal of signals) {
    proc.on(signal, onSignal);
  }
  proc.on('uncaughtException', onUncaught);
  proc.on('unhandledRejection', onUnhandled);

  return () => {
    for (const signal of signals) {
      proc.off(signal, onSignal);
    }
    proc.off('uncaughtException', onUncaught);
    proc.off('unhandledRejection', onUnhandled);
  };
}
