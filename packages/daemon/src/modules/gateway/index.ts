export { Gateway } from './gateway.js';
export type { GatewayOptions } from './gateway.js';
export { GATEWAY_CONSTS } from './consts.js';
export type { GatewayConsts } from './consts.js';
export { BOOTSTRAP_PEERS } from './bootstrap-peers.js';
export { parseNetAddress, formatNetAddress, isLocalHost } from './net-address.js';
export type { NetAddress } from './net-address.js';
