import { BASE_ASSET, tokenAsset } from '../../assets/asset-ledger.js';
import { ExchangeError } from '../../errors.js';
import logger from '../../logger.js';
import type { LedgerStore } from '../../store.js';
import { parseAmount } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { calculateWithdrawal } from '../../utils/pool.js';
import validate from '../../validation/index.js';
import type { CallContext, ExecutionEnv, ProcessOutcome, ValidationResult } from '../types.js';
import { applyReserveDelta, burnShares, getPool } from './pool-helpers.js';
import type { PoolRemoveLiquidityData, RemoveLiquidityResult } from './pool-interfaces.js';

export function validateTx(data: PoolRemoveLiquidityData, _ctx: CallContext, _store: LedgerStore): ValidationResult {
    return validate.validatePoolRemoveLiquidityFields(data);
}

export function processTx(data: PoolRemoveLiquidityData, ctx: CallContext, env: ExecutionEnv): ProcessOutcome<RemoveLiquidityResult> {
    const shareAmount = parseAmount(data.shareAmount, 'shareAmount');
    const minBaseAmount = parseAmount(data.minBaseAmount, 'minBaseAmount');
    const minTokenAmount = parseAmount(data.minTokenAmount, 'minTokenAmount');

    const pool = getPool(env.store, data.token);
    // Fails with InsufficientShares before any amount is computed
    burnShares(env.store, ctx, pool.token, ctx.sender, shareAmount);

    // Rounded down on both sides; dust stays in the pool
    const withdrawal = calculateWithdrawal(shareAmount, pool.baseReserve, pool.tokenReserve, pool.shareSupply);
    if (withdrawal.baseAmount === 0n && withdrawal.tokenAmount === 0n) {
        throw new ExchangeError('InsufficientLiquidity', `Burning ${shareAmount} shares of ${pool.key} returns nothing`, { token: pool.key });
    }
    if (withdrawal.baseAmount < minBaseAmount || withdrawal.tokenAmount < minTokenAmount) {
        throw new ExchangeError(
            'SlippageExceeded',
            `Withdrawal of ${withdrawal.baseAmount}/${withdrawal.tokenAmount} is below minimum ${minBaseAmount}/${minTokenAmount}`,
            { token: pool.key }
        );
    }

    const updated = applyReserveDelta(env.store, pool.token, -withdrawal.baseAmount, -withdrawal.tokenAmount);

    logEvent(env.store, ctx, 'liquidity', 'removed', {
        token: pool.key,
        shareTokenId: pool.shareTokenId,
        baseAmount: withdrawal.baseAmount.toString(),
        tokenAmount: withdrawal.tokenAmount.toString(),
        shares: shareAmount.toString(),
    });
    logger.debug(
        `[pool-remove-liquidity] ${ctx.sender} burned ${shareAmount} shares of ${pool.key} for ${withdrawal.baseAmount}/${withdrawal.tokenAmount}; reserves now ${updated.baseReserve}/${updated.tokenReserve}`
    );

    return {
        result: {
            token: pool.token,
            shareTokenId: pool.shareTokenId,
            sharesBurned: shareAmount,
            baseAmount: withdrawal.baseAmount,
            tokenAmount: withdrawal.tokenAmount,
        },
        effects: [
            { from: env.exchangeAccount, to: ctx.sender, asset: BASE_ASSET, amount: withdrawal.baseAmount },
            { from: env.exchangeAccount, to: ctx.sender, asset: tokenAsset(pool.token), amount: withdrawal.tokenAmount },
        ],
    };
}
