import type { BuildRelease } from '@poolnode/core';

export interface GatewayConsts {
  /** Outbound dials are abandoned after this long. */
  dialTimeoutMs: number;
  /** Peer count at which inbound connections are refused and outbound dials rejected. */
  fullyConnectedThreshold: number;
}

export const GATEWAY_CONSTS: Record<BuildRelease, GatewayConsts> = {
  dev: { dialTimeoutMs: 20_000, fullyConnectedThreshold: 20 },
  standard: { dialTimeoutMs: 120_000, fullyConnectedThreshold: 128 },
  testing: { dialTimeoutMs: 500, fullyConnectedThreshold: 10 },
};
