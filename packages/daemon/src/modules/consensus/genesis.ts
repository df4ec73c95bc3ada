/**
 * Genesis blocks per build release.
 *
 * A block id is the SHA-256 of the canonical header encoding:
 *   parent_id (32 bytes) | timestamp (u64 BE) | nonce (u64 BE)
 * Each release has its own genesis, so a store written by one release is
 * recognisable to another.
 */

import { createHash } from 'node:crypto';
import type { BuildRelease } from '@poolnode/core';

export interface BlockHeader {
  parentId: Buffer;
  timestamp: number;
  nonce: number;
}

const ZERO_ID = Buffer.alloc(32);

const GENESIS_HEADERS: Record<BuildRelease, { timestamp: number; nonce: number }> = {
  standard: { timestamp: 1433600000, nonce: 0 },
  dev: { timestamp: 1424139000, nonce: 0 },
  testing: { timestamp: 1424139000, nonce: 1 },
};

export function encodeBlockHeader(header: BlockHeader): Buffer {
  if (header.parentId.length !== 32) {
    throw new Error(`parent id must be 32 bytes, got ${header.parentId.length}`);
  }
  const buf = Buffer.alloc(48);
  header.parentId.copy(buf, 0);
  buf.writeBigUInt64BE(BigInt(header.timestamp), 32);
  buf.writeBigUInt64BE(BigInt(header.nonce), 40);
  return buf;
}

export function blockId(header: BlockHeader): Buffer {
  return createHash('sha256').update(encodeBlockHeader(header)).digest();
}

export function genesisBlock(release: BuildRelease): BlockHeader {
  return { parentId: ZERO_ID, ...GENESIS_HEADERS[release] };
}

export function genesisId(release: BuildRelease): Buffer {
  return blockId(genesisBlock(release));
}
