import config from '../config.js';
import logger from '../logger.js';
import { isRecord } from '../models/common.js';
import type { TokenId } from '../utils/token-id.js';
import validateString from './string.js';

/**
 * Validates a token identity: a contract address and a lowercase hex token id
 * (possibly empty).
 * @param value Value to validate
 * @returns True if the token identity is well formed
 */
export const tokenId = (value: unknown): value is TokenId => {
    if (!isRecord(value)) {
        logger.warn('[token:validation] Token identity missing.');
        return false;
    }
    const { contract, id } = value;

    if (!validateString(contract, { minLength: 1, maxLength: config.tokenContractMaxLength, allowedChars: config.tokenContractAllowedChars })) {
        logger.warn(`[token:validation] Invalid token contract: ${String(contract)}.`);
        return false;
    }
    if (!validateString(id, { maxLength: config.tokenIdMaxLength, allowedChars: config.tokenIdAllowedChars })) {
        logger.warn(`[token:validation] Invalid token id: ${String(id)}.`);
        return false;
    }
    return true;
};

/**
 * Validates an account name. Names end up inside compound document ids, so
 * the id separator is not allowed.
 */
export const accountName = (value: unknown): value is string => {
    if (!validateString(value, {
        minLength: config.accountNameMinLength,
        maxLength: config.accountNameMaxLength,
        forbiddenChars: config.accountNameForbiddenChars,
    })) {
        logger.warn(`[account:validation] Invalid account name: ${String(value)}.`);
        return false;
    }
    return true;
};
