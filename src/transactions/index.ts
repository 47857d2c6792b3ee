import type { LedgerStore } from '../store.js';
import * as poolAddLiquidity from './pool/pool-add-liquidity.js';
import type {
    AddLiquidityResult,
    PoolAddLiquidityData,
    PoolRemoveLiquidityData,
    PoolSwapData,
    RemoveLiquidityResult,
    SwapResult,
} from './pool/pool-interfaces.js';
import * as poolRemoveLiquidity from './pool/pool-remove-liquidity.js';
import * as poolSwap from './pool/pool-swap.js';
import type {
    ShareTransferData,
    ShareTransferResult,
    ShareUpdateOperatorsData,
    ShareUpdateOperatorsResult,
} from './share/share-interfaces.js';
import * as shareTransfer from './share/share-transfer.js';
import * as shareUpdateOperators from './share/share-update-operators.js';
import { type CallContext, type ExecutionEnv, type ProcessOutcome, TransactionType, type ValidationResult } from './types.js';

// Payload and result of every transaction type
export interface TransactionPayloads {
    [TransactionType.POOL_ADD_LIQUIDITY]: { data: PoolAddLiquidityData; result: AddLiquidityResult };
    [TransactionType.POOL_REMOVE_LIQUIDITY]: { data: PoolRemoveLiquidityData; result: RemoveLiquidityResult };
    [TransactionType.POOL_SWAP]: { data: PoolSwapData; result: SwapResult };
    [TransactionType.SHARE_TRANSFER]: { data: ShareTransferData; result: ShareTransferResult };
    [TransactionType.SHARE_UPDATE_OPERATORS]: { data: ShareUpdateOperatorsData; result: ShareUpdateOperatorsResult };
}

export type TransactionKind = keyof TransactionPayloads;

export type TransactionData<K extends TransactionKind> = TransactionPayloads[K]['data'];

export type TransactionResult<K extends TransactionKind> = TransactionPayloads[K]['result'];

export interface Transaction<K extends TransactionKind = TransactionKind> {
    type: K;
    sender: string;
    id: string; // Unique transaction ID
    ts: string; // ISO 8601, supplied by the caller
    data: TransactionData<K>;
}

export interface TransactionHandler<D, R> {
    validate: (data: D, ctx: CallContext, store: LedgerStore) => ValidationResult;
    process: (data: D, ctx: CallContext, env: ExecutionEnv) => ProcessOutcome<R>;
}

type HandlerMap = { [K in TransactionKind]: TransactionHandler<TransactionData<K>, TransactionResult<K>> };

const transactionHandlers: HandlerMap = {
    [TransactionType.POOL_ADD_LIQUIDITY]: { validate: poolAddLiquidity.validateTx, process: poolAddLiquidity.processTx },
    [TransactionType.POOL_REMOVE_LIQUIDITY]: { validate: poolRemoveLiquidity.validateTx, process: poolRemoveLiquidity.processTx },
    [TransactionType.POOL_SWAP]: { validate: poolSwap.validateTx, process: poolSwap.processTx },
    [TransactionType.SHARE_TRANSFER]: { validate: shareTransfer.validateTx, process: shareTransfer.processTx },
    [TransactionType.SHARE_UPDATE_OPERATORS]: { validate: shareUpdateOperators.validateTx, process: shareUpdateOperators.processTx },
};

export function getHandler<K extends TransactionKind>(type: K): HandlerMap[K] {
    return transactionHandlers[type];
}

export function contextOf(tx: Pick<Transaction, 'sender' | 'id' | 'ts'>): CallContext {
    return { sender: tx.sender, transactionId: tx.id, timestamp: tx.ts };
}

export { TransactionType };
