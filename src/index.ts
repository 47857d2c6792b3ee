export { BASE_ASSET, InMemoryAssetLedger, tokenAsset, assetKey, describeAsset } from './assets/asset-ledger.js';
export type { Asset, AssetLedger, AssetTransfer, ReceiveHook } from './assets/asset-ledger.js';
export { Exchange } from './exchange.js';
export type { ExchangeOptions, ExchangeState, SubmitOutcome, SwapRequest } from './exchange.js';
export { EXCHANGE_ERROR_CODES, ExchangeError, isExchangeError } from './errors.js';
export type { ErrorDetails, ExchangeErrorCode } from './errors.js';
export { initializeExchange } from './initialize.js';
export type { ExchangeRuntime, InitializeOptions } from './initialize.js';
export { default as logger } from './logger.js';
export { connectStateDatabase, fromDb, loadState, MongoStateWriter } from './mongo.js';
export type { StateCollection, StateDatabase, StateWriteOperation } from './mongo.js';
export { LedgerStore } from './store.js';
export type { StateWriter, StoreChange } from './store.js';
export { TransactionType } from './transactions/index.js';
export type { Transaction, TransactionKind, TransactionResult } from './transactions/index.js';
export type * from './transactions/pool/pool-interfaces.js';
export type * from './transactions/share/share-interfaces.js';
export type { CallContext } from './transactions/types.js';
export { BigIntMath } from './utils/bigint.js';
export type { TokenId } from './utils/token-id.js';
