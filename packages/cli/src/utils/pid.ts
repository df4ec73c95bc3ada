/**
 * PID file helpers shared by start, stop and status. The file's location
 * comes from locateDaemon().
 */

import { existsSync, readFileSync, unlinkSync } from 'node:fs';

/** PID recorded in the file, or null when there is no usable PID. */
export function readPid(pidPath: string): number | null {
  if (!existsSync(pidPath)) return null;
  const pid = parseInt(readFileSync(pidPath, 'utf-8').trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

/** Remove a PID file left behind by a process that is gone. */
export function removeStalePidFile(pidPath: string): void {
  try {
    unlinkSync(pidPath);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
  }
}
