/**
 * Where the CLI finds a daemon: its data directory, the config loaded from
 * it and the PID file that config names.
 *
 * The data directory is --data-dir, else $POOLNODE_DATA_DIR, else ~/.poolnode.
 * The config is loaded the way the daemon loads it (config.toml plus
 * POOLNODE_* overrides), so both sides agree on pid_file and api.addr.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, type DaemonConfig } from '@poolnode/daemon';

export const DATA_DIR_ENV = 'POOLNODE_DATA_DIR';

export interface DaemonFiles {
  dataDir: string;
  config: DaemonConfig;
  pidPath: string;
}

export function resolveDataDir(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicit || env[DATA_DIR_ENV] || join(homedir(), '.poolnode');
}

export function locateDaemon(dataDir: string): DaemonFiles {
  const config = loadConfig(dataDir);
  return { dataDir, config, pidPath: join(dataDir, config.daemon.pid_file) };
}
