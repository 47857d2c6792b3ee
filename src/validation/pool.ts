import { ExchangeError, type ExchangeErrorCode } from '../errors.js';
import logger from '../logger.js';
import type { PoolAddLiquidityData, PoolRemoveLiquidityData, PoolSwapData } from '../transactions/pool/pool-interfaces.js';
import type { ValidationResult } from '../transactions/types.js';
import { parseAmount } from '../utils/bigint.js';
import validateAmount from './bigint.js';
import { tokenId } from './token.js';

export function invalid(code: ExchangeErrorCode, message: string, tag: string): ValidationResult {
    logger.warn(`[${tag}] ${message}`);
    return { valid: false, error: new ExchangeError(code, message) };
}

/**
 * Checks that each named field is a well formed amount and that the ones
 * that must be positive are.
 */
function validateAmounts(
    fields: Array<{ name: string; value: unknown; positive: boolean }>,
    tag: string
): ValidationResult {
    for (const field of fields) {
        if (!validateAmount(field.value)) {
            return invalid('ArithmeticError', `${field.name} must be an integer between 0 and 2^64-1`, tag);
        }
    }
    for (const field of fields) {
        if (field.positive && validateAmount(field.value) && parseAmount(field.value, field.name) === 0n) {
            return invalid('ZeroAmount', `${field.name} must be positive`, tag);
        }
    }
    return { valid: true };
}

/**
 * Validates the fields of an add liquidity request
 * @param data Pool add liquidity data
 * @returns The first problem found, or valid
 */
export const validatePoolAddLiquidityFields = (data: PoolAddLiquidityData): ValidationResult => {
    const tag = 'pool-add-liquidity';
    if (!tokenId(data.token)) {
        return invalid('PoolNotFound', 'Invalid token identity', tag);
    }
    return validateAmounts([
        { name: 'baseAmountDesired', value: data.baseAmountDesired, positive: true },
        { name: 'tokenAmountDesired', value: data.tokenAmountDesired, positive: true },
        { name: 'minShares', value: data.minShares, positive: false },
    ], tag);
};

export const validatePoolRemoveLiquidityFields = (data: PoolRemoveLiquidityData): ValidationResult => {
    const tag = 'pool-remove-liquidity';
    if (!tokenId(data.token)) {
        return invalid('PoolNotFound', 'Invalid token identity', tag);
    }
    return validateAmounts([
        { name: 'shareAmount', value: data.shareAmount, positive: true },
        { name: 'minBaseAmount', value: data.minBaseAmount, positive: false },
        { name: 'minTokenAmount', value: data.minTokenAmount, positive: false },
    ], tag);
};

export const validatePoolSwapFields = (data: PoolSwapData): ValidationResult => {
    const tag = 'pool-swap';
    if (data.tokenIn === undefined && data.tokenOut === undefined) {
        return invalid('PoolNotFound', 'A swap needs a token on at least one side', tag);
    }
    if (data.tokenIn !== undefined && !tokenId(data.tokenIn)) {
        return invalid('PoolNotFound', 'Invalid input token identity', tag);
    }
    if (data.tokenOut !== undefined && !tokenId(data.tokenOut)) {
        return invalid('PoolNotFound', 'Invalid output token identity', tag);
    }
    return validateAmounts([
        { name: 'amountIn', value: data.amountIn, positive: true },
        { name: 'minAmountOut', value: data.minAmountOut, positive: false },
    ], tag);
};
