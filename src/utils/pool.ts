import config from '../config.js';
import { BigIntMath } from './bigint.js';

const FEE_NUMERATOR = BigInt(config.feeNumerator);
const FEE_DENOMINATOR = BigInt(config.feeDenominator);

export type BindingSide = 'base' | 'token';

export interface MatchedDeposit {
    baseAmount: bigint;
    tokenAmount: bigint;
    shares: bigint;
    bindingSide: BindingSide;
}

export interface Withdrawal {
    baseAmount: bigint;
    tokenAmount: bigint;
}

/**
 * Input amount that actually moves the price once the 1% fee is taken.
 */
export function amountAfterFee(amountIn: bigint): bigint {
    return BigIntMath.mulDiv(amountIn, FEE_DENOMINATOR - FEE_NUMERATOR, FEE_DENOMINATOR);
}

/**
 * Calculates the output amount for a swap using the constant product formula.
 * The fee is taken from the input; the caller adds the full input to the reserve.
 *
 * @param inputAmount - Amount of input asset
 * @param inputReserve - Reserve of the input asset in the pool
 * @param outputReserve - Reserve of the output asset in the pool
 * @returns Output amount after fees, 0 when the trade is too small to move anything
 */
export function getOutputAmountBigInt(
    inputAmount: bigint,
    inputReserve: bigint,
    outputReserve: bigint
): bigint {
    if (inputAmount <= 0n || inputReserve <= 0n || outputReserve <= 0n) {
        return 0n;
    }

    const afterFee = amountAfterFee(inputAmount);
    if (afterFee === 0n) return 0n;

    const denominator = BigIntMath.wideAdd(inputReserve, afterFee);
    return BigIntMath.mulDiv(outputReserve, afterFee, denominator);
}

// Shares minted for the first deposit into an empty pool: floor(sqrt(base * token))
export function calculateInitialShares(baseAmount: bigint, tokenAmount: bigint): bigint {
    return BigIntMath.narrow(BigIntMath.sqrt(BigIntMath.wideMul(baseAmount, tokenAmount)), 'initial shares');
}

/**
 * Reduces a deposit to the pool's current ratio. The side whose desired
 * amount is proportionally smaller binds; on a tie the base side binds.
 * The other side is rounded up so the pool never loses value to rounding.
 */
export function matchLiquidityRatio(
    baseDesired: bigint,
    tokenDesired: bigint,
    baseReserve: bigint,
    tokenReserve: bigint,
    shareSupply: bigint
): MatchedDeposit {
    const baseWeight = BigIntMath.wideMul(baseDesired, tokenReserve);
    const tokenWeight = BigIntMath.wideMul(tokenDesired, baseReserve);

    if (baseWeight <= tokenWeight) {
        return {
            baseAmount: baseDesired,
            tokenAmount: BigIntMath.mulDivCeil(baseDesired, tokenReserve, baseReserve),
            shares: BigIntMath.mulDiv(shareSupply, baseDesired, baseReserve),
            bindingSide: 'base',
        };
    }

    return {
        baseAmount: BigIntMath.mulDivCeil(tokenDesired, baseReserve, tokenReserve),
        tokenAmount: tokenDesired,
        shares: BigIntMath.mulDiv(shareSupply, tokenDesired, tokenReserve),
        bindingSide: 'token',
    };
}

// Proportional share of both reserves, rounded down
export function calculateWithdrawal(
    shareAmount: bigint,
    baseReserve: bigint,
    tokenReserve: bigint,
    shareSupply: bigint
): Withdrawal {
    return {
        baseAmount: BigIntMath.mulDiv(baseReserve, shareAmount, shareSupply),
        tokenAmount: BigIntMath.mulDiv(tokenReserve, shareAmount, shareSupply),
    };
}
