/**
 * `poolnode status` -- Check the poolnode daemon status.
 *
 * Reports:
 *   - running (PID, version, release, API) -- PID alive + /daemon/version OK
 *   - starting (PID) -- PID alive but the API is not answering yet
 *   - stopped -- no PID file or process not alive
 */

import { z } from 'zod';
import { formatNetAddress, parseNetAddress } from '@poolnode/daemon';
import { locateDaemon } from '../utils/daemon-files.js';
import { isProcessAlive, readPid, removeStalePidFile } from '../utils/pid.js';

/** Time allowed for the version request (ms). */
const STATUS_TIMEOUT = 3_000;

const VersionResponseSchema = z.object({
  version: z.string(),
  release: z.string(),
});

/**
 * Turn a listen address into one the CLI can dial.
 * Wildcard and empty hosts are reached over loopback.
 */
export function dialableApiAddress(listenAddr: string): string {
  const { host, port } = parseNetAddress(listenAddr, { listen: true });
  if (host === '' || host === '0.0.0.0') return formatNetAddress({ host: '127.0.0.1', port });
  if (host === '::') return formatNetAddress({ host: '::1', port });
  return formatNetAddress({ host, port });
}

export async function statusCommand(dataDir: string): Promise<void> {
  const { config, pidPath } = locateDaemon(dataDir);
  const pid = readPid(pidPath);

  if (pid === null) {
    console.log('Status: stopped');
    return;
  }

  if (!isProcessAlive(pid)) {
    console.log('Status: stopped (stale PID file)');
    removeStalePidFile(pidPath);
    return;
  }

  const apiAddr = dialableApiAddress(config.api.addr);
  try {
    const res = await fetch(`http://${apiAddr}/daemon/version`, {
      headers: { 'User-Agent': config.api.user_agent },
      signal: AbortSignal.timeout(STATUS_TIMEOUT),
    });
    const parsed = res.ok ? VersionResponseSchema.safeParse(await res.json()) : null;
    if (parsed?.success) {
      const { version, release } = parsed.data;
      console.log(`Status: running (PID: ${pid}, version ${version}, release ${release}, API: ${apiAddr})`);
      return;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.log(`API not reachable at ${apiAddr}: ${message}`);
  }
  console.log(`Status: starting (PID: ${pid})`);
}
