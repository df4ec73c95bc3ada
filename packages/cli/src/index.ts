#!/usr/bin/env node
/**
 * poolnode CLI entry point.
 *
 * Commands:
 *   start   -- Run the poolnode daemon in the foreground
 *   stop    -- Stop the poolnode daemon
 *   status  -- Check poolnode daemon status
 *
 * All commands accept --data-dir <path> (default: ~/.poolnode/)
 */

import { Command } from 'commander';
import { parseFee, startCommand, type StartOptions } from './commands/start.js';
import { stopCommand } from './commands/stop.js';
import { statusCommand } from './commands/status.js';
import { resolveDataDir } from './utils/daemon-files.js';

const program = new Command();

program
  .name('poolnode')
  .description('poolnode - transaction pool node daemon')
  .version('0.1.0');

program
  .command('start')
  .description('Start the poolnode daemon')
  .option('--data-dir <path>', 'Data directory path')
  .option('--rpc-addr <addr>', 'Peer-to-peer listen address (host:port)')
  .option('--api-addr <addr>', 'HTTP API listen address (host:port)')
  .option('-b, --bind <addr>', 'Pool listen address (host:port)')
  .option('-f, --fee <fee>', 'Pool fee, in 0.01%', parseFee)
  .option('-d, --debug', 'Enable debug logging')
  .action(async (opts: StartOptions & { dataDir?: string }) => {
    const dataDir = resolveDataDir(opts.dataDir);
    await startCommand(dataDir, opts);
    // Clean shutdown; lingering sockets must not keep the process alive
    process.exit(0);
  });

program
  .command('stop')
  .description('Stop the poolnode daemon')
  .option('--data-dir <path>', 'Data directory path')
  .action(async (opts: { dataDir?: string }) => {
    const dataDir = resolveDataDir(opts.dataDir);
    await stopCommand(dataDir);
  });

program
  .command('status')
  .description('Check poolnode daemon status')
  .option('--data-dir <path>', 'Data directory path')
  .action(async (opts: { dataDir?: string }) => {
    const dataDir = resolveDataDir(opts.dataDir);
    await statusCommand(dataDir);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
