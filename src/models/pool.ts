import type { TokenId } from '../utils/token-id.js';
import { hasAmount, hasNumber, hasString, isRecord } from './common.js';

export type PoolStatus = 'ACTIVE' | 'EMPTY';

export interface PoolDoc {
    _id: string; // token key, `${contract}:${id}`
    token: TokenId;
    shareTokenId: number;
    baseReserve: string;
    tokenReserve: string;
    shareSupply: string;
    status: PoolStatus;
    createdAt: string;
    lastTradeAt?: string;
}

export function isTokenId(value: unknown): value is TokenId {
    return isRecord(value) && hasString(value, 'contract') && hasString(value, 'id');
}

export function isPoolDoc(value: unknown): value is PoolDoc {
    if (!isRecord(value)) return false;
    return (
        hasString(value, '_id') &&
        isTokenId(value.token) &&
        hasNumber(value, 'shareTokenId') &&
        hasAmount(value, 'baseReserve') &&
        hasAmount(value, 'tokenReserve') &&
        hasAmount(value, 'shareSupply') &&
        (value.status === 'ACTIVE' || value.status === 'EMPTY') &&
        hasString(value, 'createdAt') &&
        (value.lastTradeAt === undefined || hasString(value, 'lastTradeAt'))
    );
}
