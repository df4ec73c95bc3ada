/**
 * `poolnode stop` -- Stop the poolnode daemon.
 *
 * 1. Read PID file
 * 2. Check if process alive
 * 3. Send SIGTERM
 * 4. Poll until process exits (or SIGKILL after timeout)
 */

import { locateDaemon } from '../utils/daemon-files.js';
import { isProcessAlive, readPid, removeStalePidFile } from '../utils/pid.js';

/** Maximum time to wait for graceful shutdown (ms). */
export const STOP_TIMEOUT = 10_000;
/** Interval between alive checks (ms). */
const POLL_INTERVAL = 500;

export async function stopCommand(dataDir: string, timeoutMs = STOP_TIMEOUT): Promise<void> {
  const { pidPath } = locateDaemon(dataDir);
  const pid = readPid(pidPath);

  if (pid === null) {
    console.log('Daemon is not running');
    return;
  }

  if (!isProcessAlive(pid)) {
    console.log('Daemon is not running (stale PID file)');
    removeStalePidFile(pidPath);
    return;
  }

  console.log(`Stopping daemon (PID: ${pid})...`);
  process.kill(pid, 'SIGTERM');

  const started = Date.now();
  while (Date.now() - started < timeoutMs) {
    await sleep(Math.min(POLL_INTERVAL, timeoutMs));
    if (!isProcessAlive(pid)) {
      console.log('Daemon stopped');
      return;
    }
  }

  console.log(`Daemon did not stop within ${timeoutMs / 1000}s, sending SIGKILL`);
  try {
    process.kill(pid, 'SIGKILL');
  } catch (err) {
    // Exited between the last check and the kill
    if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) throw err;
  }
  console.log('Daemon killed');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
