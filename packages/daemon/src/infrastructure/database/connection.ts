/**
 * Store connection: one better-sqlite3 file per module directory.
 *
 * PRAGMAs are applied in order on every new connection:
 *   1. journal_mode = WAL
 *   2. synchronous = NORMAL
 *   3. foreign_keys = ON
 *   4. busy_timeout = 5000
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { PoolNodeError } from '@poolnode/core';
import * as schema from './schema.js';

export type StoreDatabase = BetterSQLite3Database<typeof schema>;

export interface StoreConnection {
  sqlite: DatabaseType;
  db: StoreDatabase;
  path: string;
}

/**
 * Open (or create) `dir/filename`, creating `dir` if needed.
 *
 * @throws PoolNodeError STORAGE_OPEN_FAILED with `details.path` on any failure.
 */
export function openStore(dir: string, filename: string): StoreConnection {
  const path = join(dir, filename);
  let sqlite: DatabaseType | undefined;
  try {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
    sqlite = new Database(path);

    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('synchronous = NORMAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.pragma('busy_timeout = 5000');

    const db = drizzle(sqlite, { schema });
    return { sqlite, db, path };
  } catch (err) {
    if (sqlite?.open) sqlite.close();
    const reason = err instanceof Error ? err.message : String(err);
    throw new PoolNodeError('STORAGE_OPEN_FAILED', {
      message: `Failed to open store at ${path}: ${reason}`,
      details: { path },
      cause: err,
    });
  }
}

/**
 * Close the store. Runs wal_checkpoint(TRUNCATE) first so the WAL is merged
 * into the main file. No-op on an already closed handle.
 */
export function closeStore(sqlite: DatabaseType): void {
  if (!sqlite.open) return;
  sqlite.pragma('wal_checkpoint(TRUNCATE)');
  sqlite.close();
}
