import config from '../config.js';
import logger from '../logger.js';
import type { AssetBalanceDoc } from '../models/index.js';
import type { LedgerStore } from '../store.js';
import { BigIntMath, toBigInt, toDbString } from '../utils/bigint.js';
import { formatToken, holderDocId, type TokenId, tokenKey } from '../utils/token-id.js';

export type Asset = { kind: 'base' } | { kind: 'token'; token: TokenId };

export const BASE_ASSET: Asset = { kind: 'base' };

export function tokenAsset(token: TokenId): Asset {
    return { kind: 'token', token };
}

export function assetKey(asset: Asset): string {
    return asset.kind === 'base' ? 'base' : tokenKey(asset.token);
}

export function describeAsset(asset: Asset): string {
    return asset.kind === 'base' ? config.baseAssetSymbol : formatToken(asset.token);
}

export interface AssetTransfer {
    from: string;
    to: string;
    asset: Asset;
    amount: bigint;
}

/**
 * The external ledger that actually holds base and token balances. The
 * exchange only ever asks it to move assets; a rejected transfer throws.
 */
export interface AssetLedger {
    transfer(from: string, to: string, asset: Asset, amount: bigint): void;
    // Diagnostic only, never used to decide anything
    balanceOf(holder: string, asset: Asset): bigint;
}

// Called on the recipient after it is credited; throwing rejects the transfer
export type ReceiveHook = (transfer: AssetTransfer) => void;

/**
 * Asset ledger kept in the exchange's own store, so a call that rolls back
 * also rolls back the transfers it made.
 */
export class InMemoryAssetLedger implements AssetLedger {
    private readonly hooks = new Map<string, ReceiveHook>();

    constructor(private readonly store: LedgerStore) {}

    balanceOf(holder: string, asset: Asset): bigint {
        const doc = this.store.assetBalances.findOne(holderDocId(holder, assetKey(asset)));
        return doc ? toBigInt(doc.balance) : 0n;
    }

    // Mints assets out of thin air; used to fund accounts
    credit(holder: string, asset: Asset, amount: bigint): void {
        this.store.begin();
        try {
            this.adjust(holder, asset, amount);
            this.store.commit();
        } catch (error) {
            this.store.rollback();
            throw error;
        }
    }

    onReceive(holder: string, hook: ReceiveHook | null): void {
        if (hook) this.hooks.set(holder, hook);
        else this.hooks.delete(holder);
    }

    transfer(from: string, to: string, asset: Asset, amount: bigint): void {
        if (amount === 0n) return;

        this.store.begin();
        try {
            const available = this.balanceOf(from, asset);
            if (available < amount) {
                throw new Error(`${from} holds ${available} ${describeAsset(asset)}, needs ${amount}`);
            }
            this.adjust(from, asset, -amount);
            this.adjust(to, asset, amount);

            const hook = this.hooks.get(to);
            if (hook) hook({ from, to, asset, amount });

            this.store.commit();
        } catch (error) {
            this.store.rollback();
            logger.warn(`[asset-ledger] transfer of ${amount} ${describeAsset(asset)} from ${from} to ${to} rejected: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }
        logger.trace(`[asset-ledger] moved ${amount} ${describeAsset(asset)} from ${from} to ${to}`);
    }

    private adjust(holder: string, asset: Asset, delta: bigint): void {
        const key = assetKey(asset);
        const id = holderDocId(holder, key);
        const existing = this.store.assetBalances.findOne(id);
        const current = existing ? toBigInt(existing.balance) : 0n;
        const next = delta >= 0n ? BigIntMath.add(current, delta) : BigIntMath.sub(current, -delta);

        if (next === 0n) {
            this.store.assetBalances.deleteOne(id);
        } else if (existing) {
            this.store.assetBalances.updateOne(id, { $set: { balance: toDbString(next) } });
        } else {
            const doc: AssetBalanceDoc = { _id: id, holder, asset: key, balance: toDbString(next) };
            this.store.assetBalances.insertOne(doc);
        }
    }
}
