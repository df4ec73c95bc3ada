/**
 * Real module factories: gateway -> consensus -> tpool -> api -> pool. The
 * first three keep their state under their own directory in the data dir.
 */

import { join } from 'node:path';
import type { DaemonConfig } from '../infrastructure/config/index.js';
import { Gateway } from '../modules/gateway/index.js';
import { ConsensusSet } from '../modules/consensus/index.js';
import { TransactionPool } from '../modules/transactionpool/index.js';
import { PoolServer } from '../modules/pool/index.js';
import { ApiServer } from '../api/api-server.js';
import type { ModuleFactories } from './orchestrator.js';

export type DaemonModuleFactories = ModuleFactories<Gateway, ConsensusSet, TransactionPool, ApiServer, PoolServer>;

export function createModuleFactories(
  dataDir: string,
  config: DaemonConfig,
  requestShutdown: () => void,
): DaemonModuleFactories {
  const release = config.daemon.release;

  return {
    network: () => Gateway.create(config.gateway.rpc_addr, join(dataDir, config.gateway.dir), { release }),

    chainState: async ({ network }) =>
      ConsensusSet.create(network, join(dataDir, config.consensus.dir), { release }),

    transactionPool: ({ network, chainState }) =>
      TransactionPool.create(chainState, network, join(dataDir, config.tpool.dir), {
        maxTransactions: config.tpool.max_transactions,
      }),

    serving: ({ network, chainState, transactionPool }) =>
      ApiServer.create({
        addr: config.api.addr,
        userAgent: config.api.user_agent,
        release,
        consensus: chainState,
        gateway: network,
        tpool: transactionPool,
        requestShutdown,
      }),

    pool: () => PoolServer.create({ addr: config.pool.bind_addr, fee: config.pool.fee }),
  };
}
