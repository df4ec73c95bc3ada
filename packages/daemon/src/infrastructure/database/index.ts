/**
 * Database module barrel export.
 *
 * Re-exports schema definitions, store connection, schema push, and the integrity gate.
 */

export { openStore, closeStore } from './connection.js';
export type { StoreConnection, StoreDatabase } from './connection.js';
export { pushSchema } from './migrate.js';
export { metadata, blocks, blockPath, METADATA_KEYS } from './schema.js';
export { loadPersistedState, markInconsistent } from './integrity-gate.js';
export type { IntegrityGate, LoadResult } from './integrity-gate.js';
