import config from '../config.js';

/**
 * Identity of a fungible token held by a pool: the contract that issues it
 * plus the token id inside that contract (lowercase hex, may be empty).
 */
export interface TokenId {
    contract: string;
    id: string;
}

export function tokenKey(token: TokenId): string {
    return `${token.contract}:${token.id}`;
}

export function formatToken(token: TokenId): string {
    return token.id ? `${token.contract}/${token.id}` : token.contract;
}

/** Document id of a holder's entry in a per-holder collection. */
export function holderDocId(holder: string, key: string): string {
    return `${holder}${config.accountNameForbiddenChars}${key}`;
}
