export {
  Hash32Schema,
  TransactionInputSchema,
  type TransactionInput,
  TransactionOutputSchema,
  type TransactionOutput,
  PoolTransactionSchema,
  type PoolTransaction,
  PendingTransactionSchema,
  type PendingTransaction,
} from './pool-transaction.schema.js';
