import { BASE_ASSET, tokenAsset } from '../../assets/asset-ledger.js';
import logger from '../../logger.js';
import type { LedgerStore } from '../../store.js';
import { parseAmount } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import type { CallContext, ExecutionEnv, ProcessOutcome, ValidationResult } from '../types.js';
import type { PoolSwapData, SwapResult } from './pool-interfaces.js';
import { describeRoute, processSwap, resolveSwapRoute } from './pool-processor.js';

export function validateTx(data: PoolSwapData, _ctx: CallContext, _store: LedgerStore): ValidationResult {
    return validate.validatePoolSwapFields(data);
}

export function processTx(data: PoolSwapData, ctx: CallContext, env: ExecutionEnv): ProcessOutcome<SwapResult> {
    const route = resolveSwapRoute(data);
    const amountIn = parseAmount(data.amountIn, 'amountIn');
    const minAmountOut = parseAmount(data.minAmountOut, 'minAmountOut');

    const result = processSwap(env.store, ctx, route, amountIn, minAmountOut);
    logger.debug(`[pool-swap] ${ctx.sender} swapped ${amountIn} for ${result.amountOut} via ${describeRoute(route)}`);

    const assetIn = route.kind === 'baseToToken' ? BASE_ASSET : tokenAsset(route.tokenIn);
    const assetOut = route.kind === 'tokenToBase' ? BASE_ASSET : tokenAsset(route.tokenOut);
    return {
        result,
        effects: [
            { from: ctx.sender, to: env.exchangeAccount, asset: assetIn, amount: amountIn },
            { from: env.exchangeAccount, to: ctx.sender, asset: assetOut, amount: result.amountOut },
        ],
    };
}
