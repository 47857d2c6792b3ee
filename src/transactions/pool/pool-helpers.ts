import { ExchangeError } from '../../errors.js';
import logger from '../../logger.js';
import type { PoolDoc, ShareBalanceDoc } from '../../models/index.js';
import type { LedgerStore } from '../../store.js';
import { BigIntMath, toBigInt, toDbString } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { calculateInitialShares } from '../../utils/pool.js';
import { allocateShareTokenId } from '../../utils/registry.js';
import { formatToken, holderDocId, type TokenId, tokenKey } from '../../utils/token-id.js';
import type { CallContext } from '../types.js';
import type { Pool } from './pool-interfaces.js';

export function decodePool(doc: PoolDoc): Pool {
    return {
        key: doc._id,
        token: { contract: doc.token.contract, id: doc.token.id },
        shareTokenId: doc.shareTokenId,
        baseReserve: toBigInt(doc.baseReserve),
        tokenReserve: toBigInt(doc.tokenReserve),
        shareSupply: toBigInt(doc.shareSupply),
    };
}

export function isInitialized(pool: Pool): boolean {
    return pool.baseReserve > 0n && pool.tokenReserve > 0n;
}

// Pool record regardless of whether it currently holds liquidity
export function findPool(store: LedgerStore, token: TokenId): Pool | null {
    const doc = store.pools.findOne(tokenKey(token));
    return doc ? decodePool(doc) : null;
}

export function findPoolByShareTokenId(store: LedgerStore, shareTokenId: number): Pool | null {
    const [doc] = store.pools.find(p => p.shareTokenId === shareTokenId);
    return doc ? decodePool(doc) : null;
}

/**
 * Read-only access to a tradable pool. A pool that was fully withdrawn is
 * reported as missing until it is seeded again.
 */
export function getPool(store: LedgerStore, token: TokenId): Pool {
    const pool = findPool(store, token);
    if (!pool || !isInitialized(pool)) {
        throw new ExchangeError('PoolNotFound', `No pool with liquidity for ${formatToken(token)}`, { token: tokenKey(token) });
    }
    return pool;
}

/**
 * Creates the pool record and seeds it with the first deposit. Shares for
 * the first deposit go to the caller.
 */
export function createPool(store: LedgerStore, ctx: CallContext, token: TokenId, baseAmount: bigint, tokenAmount: bigint): { pool: Pool; shares: bigint } {
    const key = tokenKey(token);
    if (store.pools.findOne(key)) {
        throw new ExchangeError('PoolExists', `A pool for ${formatToken(token)} already exists`, { token: key });
    }
    if (baseAmount === 0n || tokenAmount === 0n) {
        throw new ExchangeError('ZeroAmount', 'Both sides of the first deposit must be positive', { token: key });
    }

    const shareTokenId = allocateShareTokenId(store);
    const poolDocument: PoolDoc = {
        _id: key,
        token: { contract: token.contract, id: token.id },
        shareTokenId,
        baseReserve: toDbString(0n),
        tokenReserve: toDbString(0n),
        shareSupply: toDbString(0n),
        status: 'EMPTY',
        createdAt: ctx.timestamp,
    };
    store.pools.insertOne(poolDocument);
    logEvent(store, ctx, 'pool', 'created', { token: key, shareTokenId });
    logger.debug(`[pool-helpers] Pool ${key} created with share token ${shareTokenId}`);

    return seedPool(store, ctx, decodePool(poolDocument), baseAmount, tokenAmount);
}

// First deposit into an existing record whose reserves are both zero
export function seedPool(store: LedgerStore, ctx: CallContext, pool: Pool, baseAmount: bigint, tokenAmount: bigint): { pool: Pool; shares: bigint } {
    if (isInitialized(pool) || pool.shareSupply !== 0n) {
        throw new ExchangeError('PoolExists', `Pool ${pool.key} already holds liquidity`, { token: pool.key });
    }
    if (baseAmount === 0n || tokenAmount === 0n) {
        throw new ExchangeError('ZeroAmount', 'Both sides of the first deposit must be positive', { token: pool.key });
    }

    const shares = calculateInitialShares(baseAmount, tokenAmount);
    applyReserveDelta(store, pool.token, baseAmount, tokenAmount);
    mintShares(store, ctx, pool.token, ctx.sender, shares);
    return { pool: getPool(store, pool.token), shares };
}

/**
 * Moves a pool's reserves by signed deltas. Only the liquidity and swap
 * engines call this.
 */
export function applyReserveDelta(store: LedgerStore, token: TokenId, baseDelta: bigint, tokenDelta: bigint, tradeAt?: string): Pool {
    const pool = findPool(store, token);
    if (!pool) {
        throw new ExchangeError('PoolNotFound', `No pool for ${formatToken(token)}`, { token: tokenKey(token) });
    }

    const baseReserve = shiftReserve(pool, 'base', pool.baseReserve, baseDelta);
    const tokenReserve = shiftReserve(pool, 'token', pool.tokenReserve, tokenDelta);

    const changes: Partial<Omit<PoolDoc, '_id'>> = {
        baseReserve: toDbString(baseReserve),
        tokenReserve: toDbString(tokenReserve),
        status: baseReserve > 0n && tokenReserve > 0n ? 'ACTIVE' : 'EMPTY',
    };
    if (tradeAt) changes.lastTradeAt = tradeAt;
    store.pools.updateOne(pool.key, { $set: changes });

    logger.trace(`[pool-helpers] ${pool.key} reserves ${pool.baseReserve}/${pool.tokenReserve} -> ${baseReserve}/${tokenReserve}`);
    return { ...pool, baseReserve, tokenReserve };
}

function shiftReserve(pool: Pool, side: 'base' | 'token', reserve: bigint, delta: bigint): bigint {
    if (delta >= 0n) return BigIntMath.add(reserve, delta);
    if (-delta > reserve) {
        throw new ExchangeError('InsufficientReserve', `Pool ${pool.key} ${side} reserve ${reserve} cannot cover ${-delta}`, {
            token: pool.key,
            side,
        });
    }
    return reserve + delta;
}

export function getShareBalance(store: LedgerStore, holder: string, poolKey: string): bigint {
    const doc = store.shareBalances.findOne(holderDocId(holder, poolKey));
    return doc ? toBigInt(doc.balance) : 0n;
}

// Zero balances are removed rather than stored
function setShareBalance(store: LedgerStore, pool: Pool, holder: string, balance: bigint): void {
    const id = holderDocId(holder, pool.key);
    if (balance === 0n) {
        store.shareBalances.deleteOne(id);
        return;
    }
    if (store.shareBalances.updateOne(id, { $set: { balance: toDbString(balance) } })) return;

    const doc: ShareBalanceDoc = { _id: id, holder, pool: pool.key, shareTokenId: pool.shareTokenId, balance: toDbString(balance) };
    store.shareBalances.insertOne(doc);
}

function setShareSupply(store: LedgerStore, pool: Pool, shareSupply: bigint): void {
    store.pools.updateOne(pool.key, { $set: { shareSupply: toDbString(shareSupply) } });
}

export function mintShares(store: LedgerStore, ctx: CallContext, token: TokenId, holder: string, amount: bigint): void {
    const pool = findPool(store, token);
    if (!pool) {
        throw new ExchangeError('PoolNotFound', `No pool for ${formatToken(token)}`, { token: tokenKey(token) });
    }
    const balance = getShareBalance(store, holder, pool.key);
    setShareSupply(store, pool, BigIntMath.add(pool.shareSupply, amount));
    setShareBalance(store, pool, holder, BigIntMath.add(balance, amount));
    logEvent(store, ctx, 'share', 'minted', { shareTokenId: pool.shareTokenId, owner: holder, amount: amount.toString() });
}

export function burnShares(store: LedgerStore, ctx: CallContext, token: TokenId, holder: string, amount: bigint): void {
    const pool = findPool(store, token);
    if (!pool) {
        throw new ExchangeError('PoolNotFound', `No pool for ${formatToken(token)}`, { token: tokenKey(token) });
    }
    const balance = getShareBalance(store, holder, pool.key);
    if (balance < amount) {
        throw new ExchangeError('InsufficientShares', `${holder} holds ${balance} shares of ${pool.key}, needs ${amount}`, {
            holder,
            token: pool.key,
        });
    }
    setShareSupply(store, pool, BigIntMath.sub(pool.shareSupply, amount));
    setShareBalance(store, pool, holder, balance - amount);
    logEvent(store, ctx, 'share', 'burned', { shareTokenId: pool.shareTokenId, owner: holder, amount: amount.toString() });
}

// Moves shares between holders; supply is unchanged
export function moveShares(store: LedgerStore, pool: Pool, from: string, to: string, amount: bigint): void {
    const fromBalance = getShareBalance(store, from, pool.key);
    if (fromBalance < amount) {
        throw new ExchangeError('InsufficientShares', `${from} holds ${fromBalance} shares of ${pool.key}, needs ${amount}`, {
            holder: from,
            token: pool.key,
        });
    }
    if (from === to) return;
    setShareBalance(store, pool, from, fromBalance - amount);
    setShareBalance(store, pool, to, BigIntMath.add(getShareBalance(store, to, pool.key), amount));
}
