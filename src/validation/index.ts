import amount from './bigint.js';
import string, { type StringRules } from './string.js';
import { accountName, tokenId } from './token.js';
import {
    invalid,
    validatePoolAddLiquidityFields,
    validatePoolRemoveLiquidityFields,
    validatePoolSwapFields,
} from './pool.js';
import type { ExchangeErrorCode } from '../errors.js';
import type { PoolAddLiquidityData, PoolRemoveLiquidityData, PoolSwapData } from '../transactions/pool/pool-interfaces.js';
import type { ValidationResult } from '../transactions/types.js';
import type { TokenId } from '../utils/token-id.js';

/**
 * Validation module interface
 */
export interface ValidationModule {
    string: (value: unknown, rules?: StringRules) => value is string;
    amount: (value: unknown, allowZero?: boolean) => value is string | bigint;
    tokenId: (value: unknown) => value is TokenId;
    accountName: (value: unknown) => value is string;
    invalid: (code: ExchangeErrorCode, message: string, tag: string) => ValidationResult;
    validatePoolAddLiquidityFields: (data: PoolAddLiquidityData) => ValidationResult;
    validatePoolRemoveLiquidityFields: (data: PoolRemoveLiquidityData) => ValidationResult;
    validatePoolSwapFields: (data: PoolSwapData) => ValidationResult;
}

/**
 * Validation module with functions for validating different data types
 */
const validation: ValidationModule = {
    string,
    amount,
    tokenId,
    accountName,
    invalid,
    validatePoolAddLiquidityFields,
    validatePoolRemoveLiquidityFields,
    validatePoolSwapFields,
};

export default validation;
