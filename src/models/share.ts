import { hasAmount, hasNumber, hasString, isRecord } from './common.js';

// One holder's share balance in one pool. Zero balances are deleted.
export interface ShareBalanceDoc {
    _id: string; // `${holder}|${poolKey}`
    holder: string;
    pool: string;
    shareTokenId: number;
    balance: string;
}

// `operator` may move any of `owner`'s shares
export interface OperatorDoc {
    _id: string; // `${owner}|${operator}`
    owner: string;
    operator: string;
    since: string;
}

export function isShareBalanceDoc(value: unknown): value is ShareBalanceDoc {
    if (!isRecord(value)) return false;
    return (
        hasString(value, '_id') &&
        hasString(value, 'holder') &&
        hasString(value, 'pool') &&
        hasNumber(value, 'shareTokenId') &&
        hasAmount(value, 'balance')
    );
}

export function isOperatorDoc(value: unknown): value is OperatorDoc {
    if (!isRecord(value)) return false;
    return hasString(value, '_id') && hasString(value, 'owner') && hasString(value, 'operator') && hasString(value, 'since');
}
