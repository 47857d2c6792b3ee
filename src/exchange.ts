import { type AssetLedger, assetKey, describeAsset, tokenAsset } from './assets/asset-ledger.js';
import config from './config.js';
import { ExchangeError, type ExchangeErrorCode, toExchangeError } from './errors.js';
import logger from './logger.js';
import type { PoolDoc } from './models/index.js';
import type { LedgerStore, StateWriter } from './store.js';
import {
    contextOf,
    getHandler,
    type Transaction,
    type TransactionKind,
    type TransactionResult,
    TransactionType,
} from './transactions/index.js';
import { decodePool, findPool, getShareBalance } from './transactions/pool/pool-helpers.js';
import type {
    AddLiquidityResult,
    Pool,
    PoolAddLiquidityData,
    PoolRemoveLiquidityData,
    PoolView,
    RemoveLiquidityResult,
    SwapResult,
    SwapRoute,
} from './transactions/pool/pool-interfaces.js';
import { quoteSwap } from './transactions/pool/pool-processor.js';
import { getShareTokenPool, isOperatorOf } from './transactions/share/share-helpers.js';
import type {
    OperatorQuery,
    OperatorUpdate,
    ShareBalanceQuery,
    ShareTokenMetadata,
    ShareTransfer,
    ShareTransferResult,
    ShareUpdateOperatorsResult,
} from './transactions/share/share-interfaces.js';
import type { CallContext, TransferEffect } from './transactions/types.js';
import { parseAmount, toBigInt } from './utils/bigint.js';
import { getRegistryState } from './utils/registry.js';
import { formatToken, type TokenId, tokenKey } from './utils/token-id.js';
import validate from './validation/index.js';

export interface ExchangeOptions {
    exchangeAccount?: string;
    writer?: StateWriter | null;
}

export type SubmitOutcome<R> = { valid: true; result: R } | { valid: false; error: ExchangeError; code: ExchangeErrorCode };

export interface SwapRequest {
    amountIn: string | bigint;
    minAmountOut: string | bigint;
}

export interface ExchangeState {
    pools: Array<Omit<PoolView, 'holderShares' | 'ledgerTokenBalance'>>;
    shareBalances: Array<{ holder: string; shareTokenId: number; balance: bigint }>;
    operators: Array<{ owner: string; operator: string }>;
    lastShareTokenId: number;
}

/**
 * Entry point of the settlement core. Every mutating call runs in its own
 * savepoint: the handler commits its local state first, then the transfers
 * it asked for are performed against the asset ledger. Anything thrown on
 * the way rolls the whole call back.
 */
export class Exchange {
    readonly exchangeAccount: string;
    private writer: StateWriter | null;
    private pendingWrite: Promise<void> = Promise.resolve();

    constructor(readonly store: LedgerStore, readonly assets: AssetLedger, options: ExchangeOptions = {}) {
        this.exchangeAccount = options.exchangeAccount ?? config.exchangeAccount;
        this.writer = options.writer ?? null;
    }

    attachWriter(writer: StateWriter | null): void {
        this.writer = writer;
    }

    execute<K extends TransactionKind>(tx: Transaction<K>): TransactionResult<K> {
        if (!validate.accountName(tx.sender)) {
            throw new ExchangeError('Unauthorized', `Invalid sender ${String(tx.sender)}`);
        }
        const ctx = contextOf(tx);
        const handler = getHandler(tx.type);

        this.store.begin();
        let result: TransactionResult<K>;
        try {
            const validation = handler.validate(tx.data, ctx, this.store);
            if (!validation.valid) throw validation.error;

            const outcome = handler.process(tx.data, ctx, { store: this.store, exchangeAccount: this.exchangeAccount });
            this.performEffects(outcome.effects);
            this.store.commit();
            result = outcome.result;
        } catch (error) {
            this.store.rollback();
            const failure = toExchangeError(error, 'ArithmeticError', TransactionType[tx.type]);
            logger.warn(`[exchange] ${TransactionType[tx.type]} ${tx.id} by ${tx.sender} rejected: ${failure.code} ${failure.message}`);
            throw failure;
        }

        // Reentrant calls commit into the caller's savepoint; only the outermost call flushes
        if (this.store.depth === 0) this.flush();
        return result;
    }

    // Same as execute, but reports a rejection as a value
    submit<K extends TransactionKind>(tx: Transaction<K>): SubmitOutcome<TransactionResult<K>> {
        try {
            return { valid: true, result: this.execute(tx) };
        } catch (error) {
            const failure = toExchangeError(error, 'ArithmeticError', TransactionType[tx.type]);
            return { valid: false, error: failure, code: failure.code };
        }
    }

    addLiquidity(ctx: CallContext, data: PoolAddLiquidityData): AddLiquidityResult {
        return this.execute(this.transaction(TransactionType.POOL_ADD_LIQUIDITY, ctx, data));
    }

    removeLiquidity(ctx: CallContext, data: PoolRemoveLiquidityData): RemoveLiquidityResult {
        return this.execute(this.transaction(TransactionType.POOL_REMOVE_LIQUIDITY, ctx, data));
    }

    swapExactBaseForToken(ctx: CallContext, tokenOut: TokenId, request: SwapRequest): SwapResult {
        return this.execute(this.transaction(TransactionType.POOL_SWAP, ctx, { tokenOut, ...request }));
    }

    swapExactTokenForBase(ctx: CallContext, tokenIn: TokenId, request: SwapRequest): SwapResult {
        return this.execute(this.transaction(TransactionType.POOL_SWAP, ctx, { tokenIn, ...request }));
    }

    swapExactTokenForToken(ctx: CallContext, tokenIn: TokenId, tokenOut: TokenId, request: SwapRequest): SwapResult {
        return this.execute(this.transaction(TransactionType.POOL_SWAP, ctx, { tokenIn, tokenOut, ...request }));
    }

    transferShares(ctx: CallContext, transfers: ShareTransfer[]): ShareTransferResult {
        return this.execute(this.transaction(TransactionType.SHARE_TRANSFER, ctx, { transfers }));
    }

    updateOperators(ctx: CallContext, updates: OperatorUpdate[]): ShareUpdateOperatorsResult {
        return this.execute(this.transaction(TransactionType.SHARE_UPDATE_OPERATORS, ctx, { updates }));
    }

    balanceOf(queries: ShareBalanceQuery[]): bigint[] {
        return queries.map(query => getShareBalance(this.store, query.holder, getShareTokenPool(this.store, query.shareTokenId).key));
    }

    operatorOf(queries: OperatorQuery[]): boolean[] {
        return queries.map(query => isOperatorOf(this.store, query.owner, query.operator));
    }

    tokenMetadata(shareTokenIds: number[]): ShareTokenMetadata[] {
        return shareTokenIds.map(shareTokenId => ({ shareTokenId, token: getShareTokenPool(this.store, shareTokenId).token }));
    }

    quoteBaseForToken(tokenOut: TokenId, baseIn: string | bigint): bigint {
        return this.quote({ kind: 'baseToToken', tokenOut: this.checkToken(tokenOut) }, baseIn);
    }

    quoteTokenForBase(tokenIn: TokenId, tokenAmountIn: string | bigint): bigint {
        return this.quote({ kind: 'tokenToBase', tokenIn: this.checkToken(tokenIn) }, tokenAmountIn);
    }

    quoteTokenForToken(tokenIn: TokenId, tokenOut: TokenId, amountIn: string | bigint): bigint {
        return this.quote({ kind: 'tokenToToken', tokenIn: this.checkToken(tokenIn), tokenOut: this.checkToken(tokenOut) }, amountIn);
    }

    /**
     * Pool state as seen by `holder`. A pool that was fully withdrawn is still
     * shown, with zero reserves.
     */
    view(holder: string, token: TokenId): PoolView {
        const pool = findPool(this.store, this.checkToken(token));
        if (!pool) {
            throw new ExchangeError('PoolNotFound', `No pool for ${formatToken(token)}`, { token: tokenKey(token) });
        }
        return this.describePool(pool, holder);
    }

    // Pools in creation order, which is share token id order
    viewAll(holder: string): PoolView[] {
        return this.poolsByShareTokenId().map(doc => this.describePool(decodePool(doc), holder));
    }

    getState(): ExchangeState {
        return {
            pools: this.poolsByShareTokenId().map(doc => ({
                token: doc.token,
                shareTokenId: doc.shareTokenId,
                baseReserve: toBigInt(doc.baseReserve),
                tokenReserve: toBigInt(doc.tokenReserve),
                shareSupply: toBigInt(doc.shareSupply),
            })),
            shareBalances: this.store.shareBalances.find().map(doc => ({
                holder: doc.holder,
                shareTokenId: doc.shareTokenId,
                balance: toBigInt(doc.balance),
            })),
            operators: this.store.operators.find().map(doc => ({ owner: doc.owner, operator: doc.operator })),
            lastShareTokenId: getRegistryState(this.store).lastShareTokenId,
        };
    }

    // Resolves once every state flush started so far has finished
    async settled(): Promise<void> {
        await this.pendingWrite;
    }

    private transaction<K extends TransactionKind>(type: K, ctx: CallContext, data: Transaction<K>['data']): Transaction<K> {
        return { type, sender: ctx.sender, id: ctx.transactionId, ts: ctx.timestamp, data };
    }

    private quote(route: SwapRoute, amountIn: string | bigint): bigint {
        return quoteSwap(this.store, route, parseAmount(amountIn, 'amountIn'));
    }

    private checkToken(token: TokenId): TokenId {
        if (!validate.tokenId(token)) {
            throw new ExchangeError('PoolNotFound', 'Invalid token identifier');
        }
        return token;
    }

    private poolsByShareTokenId(): PoolDoc[] {
        return this.store.pools.find().sort((a, b) => a.shareTokenId - b.shareTokenId);
    }

    private describePool(pool: Pool, holder: string): PoolView {
        return {
            token: pool.token,
            shareTokenId: pool.shareTokenId,
            baseReserve: pool.baseReserve,
            tokenReserve: pool.tokenReserve,
            shareSupply: pool.shareSupply,
            holderShares: getShareBalance(this.store, holder, pool.key),
            ledgerTokenBalance: this.ledgerBalance(pool.token),
        };
    }

    private ledgerBalance(token: TokenId): bigint {
        try {
            return this.assets.balanceOf(this.exchangeAccount, tokenAsset(token));
        } catch (error) {
            logger.warn(`[exchange] balance query for ${formatToken(token)} failed: ${error instanceof Error ? error.message : String(error)}`);
            return 0n;
        }
    }

    private performEffects(effects: TransferEffect[]): void {
        for (const effect of effects) {
            if (effect.amount === 0n) continue;
            try {
                this.assets.transfer(effect.from, effect.to, effect.asset, effect.amount);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                throw new ExchangeError(
                    'TransferFailed',
                    `Transfer of ${effect.amount} ${describeAsset(effect.asset)} from ${effect.from} to ${effect.to} failed: ${reason}`,
                    { from: effect.from, to: effect.to, asset: assetKey(effect.asset) },
                    { cause: error }
                );
            }
        }
    }

    private flush(): void {
        const changes = this.store.takeChanges();
        const writer = this.writer;
        if (!writer || changes.length === 0) return;

        this.pendingWrite = writer.persist(changes).catch((error: unknown) => {
            logger.error(`[exchange] state flush of ${changes.length} change(s) failed: ${error instanceof Error ? error.message : String(error)}`);
        });
    }
}

export default Exchange;
