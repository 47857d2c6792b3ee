import { BASE_ASSET, tokenAsset } from '../../assets/asset-ledger.js';
import { ExchangeError } from '../../errors.js';
import logger from '../../logger.js';
import type { LedgerStore } from '../../store.js';
import { parseAmount } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { matchLiquidityRatio } from '../../utils/pool.js';
import { tokenKey } from '../../utils/token-id.js';
import validate from '../../validation/index.js';
import type { CallContext, ExecutionEnv, ProcessOutcome, ValidationResult } from '../types.js';
import { applyReserveDelta, createPool, findPool, getPool, isInitialized, mintShares, seedPool } from './pool-helpers.js';
import type { AddLiquidityResult, Pool, PoolAddLiquidityData } from './pool-interfaces.js';

export function validateTx(data: PoolAddLiquidityData, _ctx: CallContext, _store: LedgerStore): ValidationResult {
    // A missing pool is not an error here: the first deposit creates it
    return validate.validatePoolAddLiquidityFields(data);
}

/**
 * Deposits into an initialized pool at its current ratio. Only the binding
 * side is taken in full; nothing beyond the ratio is accepted.
 */
function depositAtRatio(env: ExecutionEnv, ctx: CallContext, pool: Pool, baseDesired: bigint, tokenDesired: bigint) {
    const matched = matchLiquidityRatio(baseDesired, tokenDesired, pool.baseReserve, pool.tokenReserve, pool.shareSupply);
    if (matched.shares === 0n || matched.baseAmount === 0n || matched.tokenAmount === 0n) {
        throw new ExchangeError(
            'RatioMismatch',
            `Deposit of ${baseDesired}/${tokenDesired} into ${pool.key} (${pool.baseReserve}/${pool.tokenReserve}) mints no shares`,
            { token: pool.key, bindingSide: matched.bindingSide }
        );
    }

    applyReserveDelta(env.store, pool.token, matched.baseAmount, matched.tokenAmount);
    mintShares(env.store, ctx, pool.token, ctx.sender, matched.shares);
    return matched;
}

export function processTx(data: PoolAddLiquidityData, ctx: CallContext, env: ExecutionEnv): ProcessOutcome<AddLiquidityResult> {
    const baseDesired = parseAmount(data.baseAmountDesired, 'baseAmountDesired');
    const tokenDesired = parseAmount(data.tokenAmountDesired, 'tokenAmountDesired');
    const minShares = parseAmount(data.minShares, 'minShares');

    const existing = findPool(env.store, data.token);
    let deposit: { baseAmount: bigint; tokenAmount: bigint; shares: bigint };
    if (!existing) {
        const { shares } = createPool(env.store, ctx, data.token, baseDesired, tokenDesired);
        deposit = { baseAmount: baseDesired, tokenAmount: tokenDesired, shares };
    } else if (!isInitialized(existing)) {
        const { shares } = seedPool(env.store, ctx, existing, baseDesired, tokenDesired);
        deposit = { baseAmount: baseDesired, tokenAmount: tokenDesired, shares };
    } else {
        deposit = depositAtRatio(env, ctx, existing, baseDesired, tokenDesired);
    }

    if (deposit.shares < minShares) {
        throw new ExchangeError('SlippageExceeded', `Deposit mints ${deposit.shares} shares, minimum is ${minShares}`, {
            token: tokenKey(data.token),
        });
    }

    const pool = getPool(env.store, data.token);
    logEvent(env.store, ctx, 'liquidity', 'added', {
        token: pool.key,
        shareTokenId: pool.shareTokenId,
        baseAmount: deposit.baseAmount.toString(),
        tokenAmount: deposit.tokenAmount.toString(),
        shares: deposit.shares.toString(),
        poolCreated: !existing,
    });
    logger.debug(
        `[pool-add-liquidity] Provider ${ctx.sender} added liquidity to pool ${pool.key}. Base: ${deposit.baseAmount}, Token: ${deposit.tokenAmount}, shares minted: ${deposit.shares}`
    );

    return {
        result: {
            token: pool.token,
            shareTokenId: pool.shareTokenId,
            baseAmount: deposit.baseAmount,
            tokenAmount: deposit.tokenAmount,
            shares: deposit.shares,
            poolCreated: !existing,
        },
        effects: [
            { from: ctx.sender, to: env.exchangeAccount, asset: BASE_ASSET, amount: deposit.baseAmount },
            { from: ctx.sender, to: env.exchangeAccount, asset: tokenAsset(pool.token), amount: deposit.tokenAmount },
        ],
    };
}
