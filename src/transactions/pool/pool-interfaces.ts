// Pool interfaces with string | bigint for all caller-supplied amounts

import type { TokenId } from '../../utils/token-id.js';

export interface PoolAddLiquidityData {
    token: TokenId; // Token paired with the base asset
    baseAmountDesired: string | bigint; // Upper bound of base asset to deposit
    tokenAmountDesired: string | bigint; // Upper bound of token to deposit
    minShares: string | bigint; // Minimum pool shares to receive
}

export interface PoolRemoveLiquidityData {
    token: TokenId;
    shareAmount: string | bigint; // Amount of pool shares to burn
    minBaseAmount: string | bigint;
    minTokenAmount: string | bigint;
}

/**
 * The side left out is the base asset: no tokenIn means base in, no
 * tokenOut means base out. Both present is a token to token swap through
 * the base asset.
 */
export interface PoolSwapData {
    tokenIn?: TokenId;
    tokenOut?: TokenId;
    amountIn: string | bigint;
    minAmountOut: string | bigint;
}

export type SwapRoute =
    | { kind: 'baseToToken'; tokenOut: TokenId }
    | { kind: 'tokenToBase'; tokenIn: TokenId }
    | { kind: 'tokenToToken'; tokenIn: TokenId; tokenOut: TokenId };

// Decoded view of a pool document
export interface Pool {
    key: string;
    token: TokenId;
    shareTokenId: number;
    baseReserve: bigint;
    tokenReserve: bigint;
    shareSupply: bigint;
}

export interface AddLiquidityResult {
    token: TokenId;
    shareTokenId: number;
    baseAmount: bigint;
    tokenAmount: bigint;
    shares: bigint;
    poolCreated: boolean;
}

export interface RemoveLiquidityResult {
    token: TokenId;
    shareTokenId: number;
    sharesBurned: bigint;
    baseAmount: bigint;
    tokenAmount: bigint;
}

export interface SwapHop {
    token: TokenId;
    action: 'buy_token' | 'sell_token';
    amountIn: bigint;
    amountOut: bigint;
}

export interface SwapResult {
    route: SwapRoute['kind'];
    amountIn: bigint;
    amountOut: bigint;
    hops: SwapHop[];
}

export interface PoolView {
    token: TokenId;
    shareTokenId: number;
    baseReserve: bigint;
    tokenReserve: bigint;
    shareSupply: bigint;
    holderShares: bigint;
    // What the asset ledger reports the exchange holding of this token
    ledgerTokenBalance: bigint;
}
