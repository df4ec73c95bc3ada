/**
 * Bootstrap joiner: dial a few well-known peers once the network module is up.
 *
 * Best effort by policy. Dials are started without being awaited, a failed
 * dial is not a startup failure, and nothing is retried here (the gateway's
 * own peer maintenance backfills).
 */

import { randomInt } from 'node:crypto';
import type { INetworkModule } from '@poolnode/core';

export const DEFAULT_BOOTSTRAP_COUNT = 3;

export interface BootstrapOptions {
  /** Number of peers to dial. Default 3. */
  count?: number;
  /** Observer for dial failures; the joiner itself never surfaces them. */
  onDialError?: (address: string, err: unknown) => void;
}

/** Uniformly random permutation of 0..n-1 (Fisher-Yates over crypto.randomInt). */
export function randomPermutation(n: number): number[] {
  const perm = Array.from({ length: n }, (_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    [perm[i], perm[j]] = [perm[j], perm[i]];
  }
  return perm;
}

/**
 * Start dials to min(count, peers.length) distinct peers chosen uniformly at
 * random. Returns the chosen addresses without waiting for any dial.
 *
 * @throws RangeError when count is not a non-negative integer
 */
export function joinBootstrapPeers(
  network: Pick<INetworkModule, 'connect'>,
  peers: readonly string[],
  options: BootstrapOptions = {},
): string[] {
  const requested = options.count ?? DEFAULT_BOOTSTRAP_COUNT;
  if (!Number.isInteger(requested) || requested < 0) {
    throw new RangeError(`Bootstrap count must be a non-negative integer, got ${requested}`);
  }
  const count = Math.min(requested, peers.length);
  const chosen = randomPermutation(peers.length)
    .slice(0, count)
    .map((i) => peers[i]);

  for (const address of chosen) {
    network.connect(address).catch((err: unknown) => options.onDialError?.(address, err));
  }

  return chosen;
}
