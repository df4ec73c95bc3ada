/**
 * ConsensusSet - chain-state module.
 *
 * Owns `consensus.db` in its persist directory. Construction opens the store,
 * pushes the schema and passes the integrity gate before the instance exists;
 * a store that fails the gate never yields a ConsensusSet.
 *
 * Block validation and sync are handled elsewhere; this module exposes the
 * current path and the store's write-path helpers.
 */

import { desc, eq } from 'drizzle-orm';
import {
  ShutdownGroup,
  type BuildRelease,
  type IChainStateModule,
  type INetworkModule,
} from '@poolnode/core';
import {
  openStore,
  closeStore,
  pushSchema,
  loadPersistedState,
  markInconsistent,
  blocks,
  blockPath,
  type StoreConnection,
  type StoreDatabase,
  type LoadResult,
} from '../../infrastructure/database/index.js';
import { debugLog } from '../../infrastructure/logging/index.js';
import { blockId, genesisBlock, type BlockHeader } from './genesis.js';

export const CONSENSUS_DB_FILENAME = 'consensus.db';

export interface ConsensusSetOptions {
  release: BuildRelease;
  /** Receives the genesis advisory in non-standard releases. Defaults to console.warn. */
  onAdvisory?: (message: string) => void;
}

function writeGenesis(db: StoreDatabase, header: BlockHeader, id: Buffer): void {
  db.insert(blocks)
    .values({ id, parentId: header.parentId, height: 0, timestamp: header.timestamp, nonce: header.nonce })
    .run();
  db.insert(blockPath).values({ height: 0, blockId: id }).run();
}

export class ConsensusSet implements IChainStateModule {
  private readonly tg = new ShutdownGroup();
  readonly genesisId: string;

  private constructor(
    readonly gateway: INetworkModule,
    private readonly store: StoreConnection,
    genesis: Buffer,
    readonly loadResult: LoadResult,
  ) {
    this.genesisId = genesis.toString('hex');
    this.tg.onStop(() => closeStore(store.sqlite));
  }

  static create(gateway: INetworkModule, persistDir: string, options: ConsensusSetOptions): ConsensusSet {
    const store = openStore(persistDir, CONSENSUS_DB_FILENAME);
    const header = genesisBlock(options.release);
    const genesis = blockId(header);

    let result: LoadResult;
    try {
      pushSchema(store.sqlite);
      result = loadPersistedState(store, {
        expectedGenesisId: genesis,
        enforceGenesis: options.release === 'standard',
        initialize: (db) => writeGenesis(db, header, genesis),
        onAdvisory: options.onAdvisory ?? ((message) => console.warn(`[consensus] ${message}`)),
      });
    } catch (err) {
      closeStore(store.sqlite);
      throw err;
    }

    debugLog(`consensus store ${store.path}: ${result.action}`);
    return new ConsensusSet(gateway, store, genesis, result);
  }

  /** Height of the tip of the current path. */
  height(): number {
    return this.read(() => {
      const tip = this.tip();
      return tip?.height ?? 0;
    });
  }

  currentBlockId(): string {
    return this.read(() => {
      const tip = this.tip();
      return tip ? tip.blockId.toString('hex') : this.genesisId;
    });
  }

  /** Block id at `height` on the current path, or null past the tip. */
  blockIdAt(height: number): string | null {
    return this.read(() => {
      const row = this.store.db.select().from(blockPath).where(eq(blockPath.height, height)).get();
      return row ? row.blockId.toString('hex') : null;
    });
  }

  /** Write-path helper: flags the store so the next load fails the integrity gate. */
  markInconsistent(): void {
    this.read(() => markInconsistent(this.store.db));
  }

  close(): Promise<void> {
    return this.tg.stop();
  }

  private tip() {
    return this.store.db.select().from(blockPath).orderBy(desc(blockPath.height)).limit(1).get();
  }

  private read<T>(fn: () => T): T {
    const token = this.tg.acquire();
    try {
      return fn();
    } finally {
      this.tg.release(token);
    }
  }
}
