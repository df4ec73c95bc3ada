/**
 * Integrity gate for a persisted chain store.
 *
 * Runs once when the owning module is constructed, inside a single immediate
 * (write-locking) transaction:
 *   1. not initialized -> run the module's initializer, set 'initialized'
 *   2. 'inconsistency' marker set -> CORRUPT_STATE
 *   3. stored genesis (path height 0) missing -> CORRUPT_STATE
 *   4. stored genesis != expected -> GENESIS_MISMATCH (or advisory when not enforced)
 *
 * Nothing is retried here; every failure propagates to the caller.
 */

import { eq } from 'drizzle-orm';
import { PoolNodeError } from '@poolnode/core';
import type { StoreConnection, StoreDatabase } from './connection.js';
import { metadata, blockPath, METADATA_KEYS } from './schema.js';

const FLAG_SET = '1';

export interface IntegrityGate {
  /** Identity the running binary expects at height 0. */
  expectedGenesisId: Buffer;
  /** Writes the genesis record for a fresh store. Runs inside the gate's transaction. */
  initialize: (db: StoreDatabase) => void;
  /** false in non-production releases: a mismatch is reported, not fatal. */
  enforceGenesis: boolean;
  onAdvisory?: (message: string) => void;
}

export type LoadResult =
  | { action: 'initialized' }
  | { action: 'loaded'; genesisMismatch?: true };

function isFlagSet(db: StoreDatabase, key: string): boolean {
  const row = db.select().from(metadata).where(eq(metadata.key, key)).get();
  return row?.value === FLAG_SET;
}

function setFlag(db: StoreDatabase, key: string): void {
  db.insert(metadata)
    .values({ key, value: FLAG_SET })
    .onConflictDoUpdate({ target: metadata.key, set: { value: FLAG_SET } })
    .run();
}

export function loadPersistedState(store: StoreConnection, gate: IntegrityGate): LoadResult {
  const { db } = store;

  const load = store.sqlite.transaction((): LoadResult => {
    if (!isFlagSet(db, METADATA_KEYS.initialized)) {
      gate.initialize(db);
      setFlag(db, METADATA_KEYS.initialized);
      return { action: 'initialized' };
    }

    if (isFlagSet(db, METADATA_KEYS.inconsistency)) {
      throw new PoolNodeError('CORRUPT_STATE', { details: { path: store.path } });
    }

    const genesis = db.select().from(blockPath).where(eq(blockPath.height, 0)).get();
    if (!genesis) {
      throw new PoolNodeError('CORRUPT_STATE', {
        message: 'Database is initialized but has no genesis block',
        details: { path: store.path },
      });
    }

    if (!genesis.blockId.equals(gate.expectedGenesisId)) {
      const expected = gate.expectedGenesisId.toString('hex');
      const stored = genesis.blockId.toString('hex');
      if (gate.enforceGenesis) {
        throw new PoolNodeError('GENESIS_MISMATCH', {
          details: { path: store.path, expected, stored },
        });
      }
      gate.onAdvisory?.(`genesis mismatch at ${store.path}: stored ${stored}, expected ${expected}`);
      return { action: 'loaded', genesisMismatch: true };
    }

    return { action: 'loaded' };
  });

  return load.immediate();
}

/** Flag the store as inconsistent. Every later load fails with CORRUPT_STATE. */
export function markInconsistent(db: StoreDatabase): void {
  setFlag(db, METADATA_KEYS.inconsistency);
}
