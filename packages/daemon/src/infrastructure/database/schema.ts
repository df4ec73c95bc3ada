/**
 * Drizzle ORM schema for a module's persisted chain store.
 *
 * 3 tables: metadata, blocks, block_path
 *
 * metadata holds the integrity-gate flags ('initialized', 'inconsistency').
 * block_path maps each height on the current path to a block id; height 0 is
 * the genesis identity checked on every load.
 */

import { sqliteTable, text, integer, blob, index } from 'drizzle-orm/sqlite-core';

// ---------------------------------------------------------------------------
// Table 1: metadata -- integrity flags
// ---------------------------------------------------------------------------

export const metadata = sqliteTable('metadata', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

// ---------------------------------------------------------------------------
// Table 2: blocks -- block headers by id
// ---------------------------------------------------------------------------

export const blocks = sqliteTable(
  'blocks',
  {
    id: blob('id', { mode: 'buffer' }).primaryKey(),
    parentId: blob('parent_id', { mode: 'buffer' }).notNull(),
    height: integer('height').notNull(),
    timestamp: integer('timestamp').notNull(),
    nonce: integer('nonce').notNull(),
  },
  (table) => [index('idx_blocks_height').on(table.height)],
);

// ---------------------------------------------------------------------------
// Table 3: block_path -- current path, height -> block id
// ---------------------------------------------------------------------------

export const blockPath = sqliteTable('block_path', {
  height: integer('height').primaryKey(),
  blockId: blob('block_id', { mode: 'buffer' })
    .notNull()
    .references(() => blocks.id),
});

/** Keys used in the metadata table. */
export const METADATA_KEYS = {
  initialized: 'initialized',
  inconsistency: 'inconsistency',
} as const;
