/**
 * Gateway routes:
 *
 * GET  /gateway                        - listener address and peers
 * POST /gateway/connect/{address}      - dial a peer (waits for the dial)
 * POST /gateway/disconnect/{address}   - drop a peer
 */

import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import type { INetworkModule } from '@poolnode/core';
import {
  GatewayResponseSchema,
  PeerAddressParamSchema,
  PeerActionResponseSchema,
  openApiValidationHook,
} from './openapi-schemas.js';

const gatewayRoute = createRoute({
  method: 'get',
  path: '/gateway',
  tags: ['Gateway'],
  summary: 'Gateway address and peers',
  responses: {
    200: {
      description: 'Gateway state',
      content: { 'application/json': { schema: GatewayResponseSchema } },
    },
  },
});

const connectRoute = createRoute({
  method: 'post',
  path: '/gateway/connect/{address}',
  tags: ['Gateway'],
  summary: 'Connect to a peer',
  request: { params: PeerAddressParamSchema },
  responses: {
    200: {
      description: 'Peer connected',
      content: { 'application/json': { schema: PeerActionResponseSchema } },
    },
  },
});

const disconnectRoute = createRoute({
  method: 'post',
  path: '/gateway/disconnect/{address}',
  tags: ['Gateway'],
  summary: 'Disconnect from a peer',
  request: { params: PeerAddressParamSchema },
  responses: {
    200: {
      description: 'Peer disconnected',
      content: { 'application/json': { schema: PeerActionResponseSchema } },
    },
  },
});

export function gatewayRoutes(deps: { gateway: INetworkModule }): OpenAPIHono {
  const router = new OpenAPIHono({ defaultHook: openApiValidationHook });

  router.openapi(gatewayRoute, (c) =>
    c.json({ netAddress: deps.gateway.address(), peers: deps.gateway.peers() }, 200),
  );

  router.openapi(connectRoute, async (c) => {
    const { address } = c.req.valid('param');
    await deps.gateway.connect(address);
    return c.json({ success: true as const, address }, 200);
  });

  router.openapi(disconnectRoute, (c) => {
    const { address } = c.req.valid('param');
    deps.gateway.disconnect(address);
    return c.json({ success: true as const, address }, 200);
  });

  return router;
}
