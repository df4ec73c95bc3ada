import type { PendingTransaction } from '../schemas/pool-transaction.schema.js';

/**
 * Contracts between the daemon's five long-running modules.
 *
 * Each module owns a ShutdownGroup; close() stops that group, which runs the
 * module's cleanup hooks and waits for its in-flight work to drain.
 */
export interface IManagedModule {
  close(): Promise<void>;
}

export interface PeerInfo {
  address: string;
  inbound: boolean;
  connectedAt: number;
}

/** Network (gateway) module. */
export interface INetworkModule extends IManagedModule {
  /** Address the peer listener is bound to, as host:port. */
  address(): string;
  connect(address: string): Promise<void>;
  disconnect(address: string): void;
  peers(): PeerInfo[];
}

/** Chain-state (consensus) module. */
export interface IChainStateModule extends IManagedModule {
  /** Hex-encoded identity of block 0. */
  readonly genesisId: string;
  height(): number;
  currentBlockId(): string;
  /** Block id at `height` on the current path, or null past the tip. */
  blockIdAt(height: number): string | null;
}

/** Pending-transaction module. */
export interface ITransactionPoolModule extends IManagedModule {
  acceptTransaction(input: unknown): PendingTransaction;
  transactions(): PendingTransaction[];
  /** Drops every pending transaction and returns how many were dropped. */
  purge(): number;
  readonly size: number;
}

/** Request-serving module. Bound at construction, accepting once serve() is called. */
export interface IServingModule extends IManagedModule {
  address(): string;
  /** Resolves when the server has been closed, rejects on a fatal server error. */
  serve(): Promise<void>;
}

/** Miner-facing pool server. Serves like IServingModule, alongside the control API. */
export interface IPoolModule extends IServingModule {
  /** Pool fee in hundredths of a percent (200 = 2%). */
  readonly fee: number;
}
