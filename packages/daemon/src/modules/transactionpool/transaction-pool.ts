/**
 * TransactionPool - pending-transaction module.
 *
 * Holds submitted transactions in memory, keyed by the SHA-256 of their
 * canonical JSON form. Relay to peers and block inclusion happen elsewhere.
 */

import { createHash } from 'node:crypto';
import { mkdir } from 'node:fs/promises';
import {
  PoolNodeError,
  PoolTransactionSchema,
  ShutdownGroup,
  type IChainStateModule,
  type INetworkModule,
  type ITransactionPoolModule,
  type PendingTransaction,
  type PoolTransaction,
} from '@poolnode/core';
import { debugLog } from '../../infrastructure/logging/index.js';

export interface TransactionPoolOptions {
  maxTransactions: number;
}

/** Field order is fixed so equal transactions always hash the same. */
function canonicalJson(tx: PoolTransaction): string {
  return JSON.stringify({
    inputs: tx.inputs.map((i) => ({ parentId: i.parentId, unlockHash: i.unlockHash })),
    outputs: tx.outputs.map((o) => ({ value: o.value, unlockHash: o.unlockHash })),
    minerFees: tx.minerFees,
    arbitraryData: tx.arbitraryData ?? null,
  });
}

export function transactionId(tx: PoolTransaction): string {
  return createHash('sha256').update(canonicalJson(tx)).digest('hex');
}

export class TransactionPool implements ITransactionPoolModule {
  private readonly tg = new ShutdownGroup();
  private readonly pending = new Map<string, PendingTransaction>();

  private constructor(
    readonly consensus: IChainStateModule,
    readonly gateway: INetworkModule,
    readonly persistDir: string,
    private readonly options: TransactionPoolOptions,
  ) {
    this.tg.onStop(() => this.pending.clear());
  }

  static async create(
    consensus: IChainStateModule,
    gateway: INetworkModule,
    persistDir: string,
    options: TransactionPoolOptions,
  ): Promise<TransactionPool> {
    await mkdir(persistDir, { recursive: true, mode: 0o700 });
    return new TransactionPool(consensus, gateway, persistDir, options);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Validate and admit a transaction.
   *
   * @throws PoolNodeError TRANSACTION_INVALID, TRANSACTION_DUPLICATE, POOL_FULL, ALREADY_STOPPED
   */
  acceptTransaction(input: unknown): PendingTransaction {
    const token = this.tg.acquire();
    try {
      const parsed = PoolTransactionSchema.safeParse(input);
      if (!parsed.success) {
        throw new PoolNodeError('TRANSACTION_INVALID', {
          message: `Invalid transaction: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
          details: { issues: parsed.error.issues },
        });
      }

      const id = transactionId(parsed.data);
      if (this.pending.has(id)) {
        throw new PoolNodeError('TRANSACTION_DUPLICATE', { details: { id } });
      }
      if (this.pending.size >= this.options.maxTransactions) {
        throw new PoolNodeError('POOL_FULL', { details: { limit: this.options.maxTransactions } });
      }

      const entry: PendingTransaction = {
        id,
        transaction: parsed.data,
        seenAtHeight: this.consensus.height(),
        receivedAt: Date.now(),
      };
      this.pending.set(id, entry);
      debugLog(`tpool: accepted ${id} at height ${entry.seenAtHeight}`);
      return entry;
    } finally {
      this.tg.release(token);
    }
  }

  /** Pending transactions in arrival order. */
  transactions(): PendingTransaction[] {
    return [...this.pending.values()];
  }

  /** Drop every pending transaction, returning how many were dropped. */
  purge(): number {
    const dropped = this.pending.size;
    this.pending.clear();
    debugLog(`tpool: purged ${dropped} transactions`);
    return dropped;
  }

  close(): Promise<void> {
    return this.tg.stop();
  }
}
