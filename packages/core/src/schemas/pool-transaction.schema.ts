import { z } from 'zod';

const hash32Pattern = /^[0-9a-f]{64}$/;
const numericStringPattern = /^\d+$/;

export const Hash32Schema = z.string().regex(hash32Pattern, 'must be 32 bytes of lowercase hex');

export const TransactionInputSchema = z.object({
  parentId: Hash32Schema,
  unlockHash: Hash32Schema,
});
export type TransactionInput = z.infer<typeof TransactionInputSchema>;

export const TransactionOutputSchema = z.object({
  value: z.string().regex(numericStringPattern, 'value must be a numeric string (hastings)'),
  unlockHash: Hash32Schema,
});
export type TransactionOutput = z.infer<typeof TransactionOutputSchema>;

/** Transaction as submitted to the pool (POST /tpool/transactions). */
export const PoolTransactionSchema = z.object({
  inputs: z.array(TransactionInputSchema).min(1),
  outputs: z.array(TransactionOutputSchema).min(1),
  minerFees: z.array(z.string().regex(numericStringPattern)).default([]),
  arbitraryData: z.string().max(1024).optional(),
});
export type PoolTransaction = z.infer<typeof PoolTransactionSchema>;

/** Transaction as held by the pool. */
export const PendingTransactionSchema = z.object({
  id: Hash32Schema,
  transaction: PoolTransactionSchema,
  seenAtHeight: z.number().int().nonnegative(),
  receivedAt: z.number().int(),
});
export type PendingTransaction = z.infer<typeof PendingTransactionSchema>;
