import type { Asset } from '../assets/asset-ledger.js';
import type { ExchangeError } from '../errors.js';
import type { LedgerStore } from '../store.js';

export enum TransactionType {
  // Pool Transactions
  POOL_ADD_LIQUIDITY = 1,
  POOL_REMOVE_LIQUIDITY = 2,
  POOL_SWAP = 3,

  // Share Token Transactions
  SHARE_TRANSFER = 10,
  SHARE_UPDATE_OPERATORS = 11,
}

/**
 * Who is calling and under which transaction. The timestamp is supplied by
 * the caller (ISO 8601) so nothing depends on the local clock.
 */
export interface CallContext {
  sender: string;
  transactionId: string;
  timestamp: string;
}

export type ValidationResult = { valid: true } | { valid: false; error: ExchangeError };

/**
 * A movement on the external asset ledger that a call requests once its
 * local state is committed.
 */
export interface TransferEffect {
  from: string;
  to: string;
  asset: Asset;
  amount: bigint;
}

export interface ProcessOutcome<R> {
  result: R;
  effects: TransferEffect[];
}

// What a handler may touch while it runs
export interface ExecutionEnv {
  store: LedgerStore;
  exchangeAccount: string;
}
