/**
 * Response schemas for the OpenAPI routes, plus the shared validation hook.
 *
 * Request/response payloads reuse @poolnode/core schemas where one exists.
 */

import { z } from '@hono/zod-openapi';
import type { ZodError } from 'zod';
import { PoolNodeError, PendingTransactionSchema, BuildReleaseEnum } from '@poolnode/core';

// ---------------------------------------------------------------------------
// Validation hook: invalid params/body -> 400 VALIDATION_FAILED via errorHandler
// ---------------------------------------------------------------------------

export function openApiValidationHook(
  result: { success: true; data: unknown } | { success: false; error: ZodError },
): void {
  if (!result.success) {
    throw new PoolNodeError('VALIDATION_FAILED', {
      details: { issues: result.error.issues },
    });
  }
}

// ---------------------------------------------------------------------------
// /daemon
// ---------------------------------------------------------------------------

export const DaemonVersionResponseSchema = z
  .object({
    version: z.string(),
    release: BuildReleaseEnum,
  })
  .openapi('DaemonVersionResponse');

export const DaemonStopResponseSchema = z
  .object({
    message: z.string(),
  })
  .openapi('DaemonStopResponse');

// ---------------------------------------------------------------------------
// /consensus
// ---------------------------------------------------------------------------

export const ConsensusResponseSchema = z
  .object({
    height: z.number().int(),
    currentBlock: z.string(),
    genesisId: z.string(),
  })
  .openapi('ConsensusResponse');

export const BlockHeightParamSchema = z.object({
  height: z.coerce
    .number()
    .int()
    .nonnegative()
    .openapi({ param: { name: 'height', in: 'path' }, example: 0 }),
});

export const ConsensusBlockResponseSchema = z
  .object({
    height: z.number().int(),
    blockId: z.string(),
  })
  .openapi('ConsensusBlockResponse');

// ---------------------------------------------------------------------------
// /gateway
// ---------------------------------------------------------------------------

export const PeerSchema = z
  .object({
    address: z.string(),
    inbound: z.boolean(),
    connectedAt: z.number().int(),
  })
  .openapi('Peer');

export const GatewayResponseSchema = z
  .object({
    netAddress: z.string(),
    peers: z.array(PeerSchema),
  })
  .openapi('GatewayResponse');

export const PeerAddressParamSchema = z.object({
  address: z.string().min(1).openapi({ param: { name: 'address', in: 'path' }, example: '127.0.0.1:9981' }),
});

export const PeerActionResponseSchema = z
  .object({
    success: z.literal(true),
    address: z.string(),
  })
  .openapi('PeerActionResponse');

// ---------------------------------------------------------------------------
// /tpool
// ---------------------------------------------------------------------------

export const TpoolTransactionsResponseSchema = z
  .object({
    count: z.number().int(),
    transactions: z.array(PendingTransactionSchema),
  })
  .openapi('TpoolTransactionsResponse');

export const TpoolPurgeResponseSchema = z
  .object({
    purged: z.number().int(),
  })
  .openapi('TpoolPurgeResponse');
