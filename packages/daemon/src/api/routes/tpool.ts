/**
 * Transaction pool routes:
 *
 * GET    /tpool/transactions - pending transactions
 * POST   /tpool/transactions - submit a transaction (201 with the pending entry)
 * DELETE /tpool/transactions - drop every pending transaction
 */

import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import { PendingTransactionSchema, PoolTransactionSchema, type ITransactionPoolModule } from '@poolnode/core';
import {
  TpoolPurgeResponseSchema,
  TpoolTransactionsResponseSchema,
  openApiValidationHook,
} from './openapi-schemas.js';

const listRoute = createRoute({
  method: 'get',
  path: '/tpool/transactions',
  tags: ['Transaction Pool'],
  summary: 'List pending transactions',
  responses: {
    200: {
      description: 'Pending transactions in arrival order',
      content: { 'application/json': { schema: TpoolTransactionsResponseSchema } },
    },
  },
});

const submitRoute = createRoute({
  method: 'post',
  path: '/tpool/transactions',
  tags: ['Transaction Pool'],
  summary: 'Submit a transaction',
  request: {
    body: {
      content: { 'application/json': { schema: PoolTransactionSchema } },
      required: true,
    },
  },
  responses: {
    201: {
      description: 'Transaction accepted',
      content: { 'application/json': { schema: PendingTransactionSchema } },
    },
  },
});

const purgeRoute = createRoute({
  method: 'delete',
  path: '/tpool/transactions',
  tags: ['Transaction Pool'],
  summary: 'Purge pending transactions',
  responses: {
    200: {
      description: 'Number of transactions dropped',
      content: { 'application/json': { schema: TpoolPurgeResponseSchema } },
    },
  },
});

export function tpoolRoutes(deps: { tpool: ITransactionPoolModule }): OpenAPIHono {
  const router = new OpenAPIHono({ defaultHook: openApiValidationHook });

  router.openapi(listRoute, (c) => {
    const transactions = deps.tpool.transactions();
    return c.json({ count: transactions.length, transactions }, 200);
  });

  router.openapi(submitRoute, (c) => {
    const entry = deps.tpool.acceptTransaction(c.req.valid('json'));
    return c.json(entry, 201);
  });

  router.openapi(purgeRoute, (c) => c.json({ purged: deps.tpool.purge() }, 200));

  return router;
}
