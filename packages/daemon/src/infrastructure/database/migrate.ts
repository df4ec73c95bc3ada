/**
 * Schema push for a module's chain store.
 *
 * Creates the 3 tables with CREATE TABLE IF NOT EXISTS, so it is safe to run on
 * every open. DDL here must stay in step with schema.ts.
 */

import type { Database } from 'better-sqlite3';

function getCreateTableStatements(): string[] {
  return [
    `CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
)`,
    `CREATE TABLE IF NOT EXISTS blocks (
  id BLOB PRIMARY KEY,
  parent_id BLOB NOT NULL,
  height INTEGER NOT NULL CHECK (height >= 0),
  timestamp INTEGER NOT NULL,
  nonce INTEGER NOT NULL
)`,
    `CREATE TABLE IF NOT EXISTS block_path (
  height INTEGER PRIMARY KEY,
  block_id BLOB NOT NULL REFERENCES blocks(id)
)`,
  ];
}

function getCreateIndexStatements(): string[] {
  return ['CREATE INDEX IF NOT EXISTS idx_blocks_height ON blocks(height)'];
}

/** Create all tables and indexes in one transaction. Idempotent. */
export function pushSchema(sqlite: Database): void {
  const push = sqlite.transaction(() => {
    for (const stmt of getCreateTableStatements()) {
      sqlite.exec(stmt);
    }
    for (const stmt of getCreateIndexStatements()) {
      sqlite.exec(stmt);
    }
  });
  push();
}
