export { TransactionPool, transactionId } from './transaction-pool.js';
export type { TransactionPoolOptions } from './transaction-pool.js';
