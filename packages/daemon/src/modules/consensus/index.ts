export { ConsensusSet, CONSENSUS_DB_FILENAME } from './consensus-set.js';
export type { ConsensusSetOptions } from './consensus-set.js';
export { genesisBlock, genesisId, blockId, encodeBlockHeader } from './genesis.js';
export type { BlockHeader } from './genesis.js';
