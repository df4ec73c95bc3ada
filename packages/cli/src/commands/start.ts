/**
 * `poolnode start` -- Run the poolnode daemon in the foreground.
 *
 * 1. Refuse when a live daemon already owns the PID file
 * 2. Dynamic import @poolnode/daemon and run startDaemon() until shutdown
 */

import { InvalidArgumentError } from 'commander';
import type { ConfigOverrides } from '@poolnode/daemon';
import { locateDaemon } from '../utils/daemon-files.js';
import { isProcessAlive, readPid } from '../utils/pid.js';

export interface StartOptions {
  rpcAddr?: string;
  apiAddr?: string;
  /** Pool listen address. */
  bind?: string;
  /** Pool fee in hundredths of a percent. */
  fee?: number;
  debug?: boolean;
}

/** commander argParser for --fee: an integer from 0 to 10000. */
export function parseFee(value: string): number {
  const fee = Number(value);
  if (!/^\d+$/.test(value.trim()) || fee > 10_000) {
    throw new InvalidArgumentError('Fee must be an integer from 0 to 10000 (hundredths of a percent).');
  }
  return fee;
}

/** Map CLI flags onto config sections. Unset flags leave the config alone. */
export function toConfigOverrides(opts: StartOptions): ConfigOverrides {
  return {
    gateway: { rpc_addr: opts.rpcAddr },
    api: { addr: opts.apiAddr },
    pool: { bind_addr: opts.bind, fee: opts.fee },
    daemon: { log_level: opts.debug ? 'debug' : undefined },
  };
}

export async function startCommand(dataDir: string, opts: StartOptions = {}): Promise<void> {
  // A stale PID file (process gone) does not block startup; the daemon overwrites it
  const pid = readPid(locateDaemon(dataDir).pidPath);
  if (pid !== null && isProcessAlive(pid)) {
    console.error(`Daemon already running (PID: ${pid})`);
    process.exit(1);
  }

  try {
    const { startDaemon } = await import('@poolnode/daemon');
    await startDaemon(dataDir, toConfigOverrides(opts));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to start daemon: ${message}`);
    process.exit(1);
  }
}
