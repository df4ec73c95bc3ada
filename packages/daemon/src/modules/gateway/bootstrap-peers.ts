/**
 * Well-known peers dialled on first contact. Read-only; sampled at startup,
 * overridable through gateway.bootstrap_peers.
 */
export const BOOTSTRAP_PEERS: readonly string[] = Object.freeze([
  'seed1.poolnode.example:9981',
  'seed2.poolnode.example:9981',
  'seed3.poolnode.example:9981',
  'seed4.poolnode.example:9981',
  'seed5.poolnode.example:9981',
  'seed6.poolnode.example:9981',
  'seed7.poolnode.example:9981',
  'seed8.poolnode.example:9981',
]);
