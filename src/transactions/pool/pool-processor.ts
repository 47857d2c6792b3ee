import { ExchangeError } from '../../errors.js';
import logger from '../../logger.js';
import type { LedgerStore } from '../../store.js';
import { logEvent } from '../../utils/event-logger.js';
import { getOutputAmountBigInt } from '../../utils/pool.js';
import { type TokenId, tokenKey } from '../../utils/token-id.js';
import type { CallContext } from '../types.js';
import { applyReserveDelta, getPool } from './pool-helpers.js';
import type { PoolSwapData, SwapHop, SwapResult, SwapRoute } from './pool-interfaces.js';

/**
 * Resolves the swap direction once, at entry. Everything downstream
 * switches on the route kind instead of re-inspecting the request.
 */
export function resolveSwapRoute(data: PoolSwapData): SwapRoute {
    if (data.tokenIn && data.tokenOut) {
        return { kind: 'tokenToToken', tokenIn: data.tokenIn, tokenOut: data.tokenOut };
    }
    if (data.tokenIn) {
        return { kind: 'tokenToBase', tokenIn: data.tokenIn };
    }
    if (data.tokenOut) {
        return { kind: 'baseToToken', tokenOut: data.tokenOut };
    }
    throw new ExchangeError('PoolNotFound', 'A swap needs a token on at least one side');
}

interface HopOptions {
    // Absent for simulations: no events, no trade timestamp
    ctx: CallContext | null;
    doubleSwap: boolean;
}

/**
 * One constant-product trade against one pool. The pool is read fresh from
 * the store so a second hop sees what the first one did.
 */
function swapHop(store: LedgerStore, token: TokenId, action: SwapHop['action'], amountIn: bigint, options: HopOptions): SwapHop {
    const pool = getPool(store, token);
    const sellingToken = action === 'sell_token';
    const reserveIn = sellingToken ? pool.tokenReserve : pool.baseReserve;
    const reserveOut = sellingToken ? pool.baseReserve : pool.tokenReserve;

    const amountOut = getOutputAmountBigInt(amountIn, reserveIn, reserveOut);
    if (amountOut === 0n) {
        throw new ExchangeError('InsufficientLiquidity', `Swapping ${amountIn} into ${pool.key} yields nothing`, {
            token: pool.key,
            action,
        });
    }

    const tradeAt = options.ctx?.timestamp;
    if (sellingToken) {
        applyReserveDelta(store, token, -amountOut, amountIn, tradeAt);
    } else {
        applyReserveDelta(store, token, amountIn, -amountOut, tradeAt);
    }

    if (options.ctx) {
        logEvent(store, options.ctx, 'swap', action, {
            client: options.ctx.sender,
            doubleSwap: options.doubleSwap,
            token: pool.key,
            baseAmount: (sellingToken ? amountOut : amountIn).toString(),
            tokenAmount: (sellingToken ? amountIn : amountOut).toString(),
            baseReserve: pool.baseReserve.toString(),
            tokenReserve: pool.tokenReserve.toString(),
        });
    }
    logger.trace(`[pool-processor] ${action} on ${pool.key}: ${amountIn} in, ${amountOut} out`);

    return { token: pool.token, action, amountIn, amountOut };
}

function routeHops(store: LedgerStore, route: SwapRoute, amountIn: bigint, ctx: CallContext | null): SwapHop[] {
    switch (route.kind) {
        case 'baseToToken':
            return [swapHop(store, route.tokenOut, 'buy_token', amountIn, { ctx, doubleSwap: false })];
        case 'tokenToBase':
            return [swapHop(store, route.tokenIn, 'sell_token', amountIn, { ctx, doubleSwap: false })];
        case 'tokenToToken': {
            const sold = swapHop(store, route.tokenIn, 'sell_token', amountIn, { ctx, doubleSwap: true });
            const bought = swapHop(store, route.tokenOut, 'buy_token', sold.amountOut, { ctx, doubleSwap: true });
            return [sold, bought];
        }
    }
}

function runRoute(store: LedgerStore, route: SwapRoute, amountIn: bigint, ctx: CallContext | null): SwapResult {
    const hops = routeHops(store, route, amountIn, ctx);
    return { route: route.kind, amountIn, amountOut: hops[hops.length - 1].amountOut, hops };
}

/**
 * Executes a swap against the store. The caller owns the savepoint; any
 * error leaves partial hops for it to roll back.
 */
export function processSwap(store: LedgerStore, ctx: CallContext, route: SwapRoute, amountIn: bigint, minAmountOut: bigint): SwapResult {
    const result = runRoute(store, route, amountIn, ctx);
    if (result.amountOut < minAmountOut) {
        throw new ExchangeError('SlippageExceeded', `Swap returns ${result.amountOut}, minimum is ${minAmountOut}`, {
            route: route.kind,
        });
    }
    return result;
}

/**
 * What a swap of `amountIn` would return right now. Runs the same hops as
 * processSwap inside a savepoint that is always rolled back.
 */
export function quoteSwap(store: LedgerStore, route: SwapRoute, amountIn: bigint): bigint {
    if (amountIn === 0n) {
        throw new ExchangeError('ZeroAmount', 'Cannot quote a zero input');
    }
    return store.simulate(() => runRoute(store, route, amountIn, null)).amountOut;
}

export function describeRoute(route: SwapRoute): string {
    switch (route.kind) {
        case 'baseToToken':
            return `base -> ${tokenKey(route.tokenOut)}`;
        case 'tokenToBase':
            return `${tokenKey(route.tokenIn)} -> base`;
        case 'tokenToToken':
            return `${tokenKey(route.tokenIn)} -> base -> ${tokenKey(route.tokenOut)}`;
    }
}
