/**
 * Consensus routes:
 *
 * GET /consensus                  - height and tip of the current path
 * GET /consensus/blocks/{height}  - block id at a height (404 past the tip)
 */

import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import { PoolNodeError, type IChainStateModule } from '@poolnode/core';
import {
  BlockHeightParamSchema,
  ConsensusBlockResponseSchema,
  ConsensusResponseSchema,
  openApiValidationHook,
} from './openapi-schemas.js';

const consensusRoute = createRoute({
  method: 'get',
  path: '/consensus',
  tags: ['Consensus'],
  summary: 'Consensus state',
  responses: {
    200: {
      description: 'Current path',
      content: { 'application/json': { schema: ConsensusResponseSchema } },
    },
  },
});

const blockRoute = createRoute({
  method: 'get',
  path: '/consensus/blocks/{height}',
  tags: ['Consensus'],
  summary: 'Block id at a height',
  request: { params: BlockHeightParamSchema },
  responses: {
    200: {
      description: 'Block on the current path',
      content: { 'application/json': { schema: ConsensusBlockResponseSchema } },
    },
  },
});

export function consensusRoutes(deps: { consensus: IChainStateModule }): OpenAPIHono {
  const router = new OpenAPIHono({ defaultHook: openApiValidationHook });

  router.openapi(consensusRoute, (c) =>
    c.json(
      {
        height: deps.consensus.height(),
        currentBlock: deps.consensus.currentBlockId(),
        genesisId: deps.consensus.genesisId,
      },
      200,
    ),
  );

  router.openapi(blockRoute, (c) => {
    const { height } = c.req.valid('param');
    const blockId = deps.consensus.blockIdAt(height);
    if (blockId === null) {
      throw new PoolNodeError('BLOCK_NOT_FOUND', { details: { height } });
    }
    return c.json({ height, blockId }, 200);
  });

  return router;
}
