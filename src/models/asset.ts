import { hasAmount, hasString, isRecord } from './common.js';

export interface AssetBalanceDoc {
    _id: string; // `${holder}|${assetKey}`
    holder: string;
    asset: string;
    balance: string;
}

export function isAssetBalanceDoc(value: unknown): value is AssetBalanceDoc {
    if (!isRecord(value)) return false;
    return hasString(value, '_id') && hasString(value, 'holder') && hasString(value, 'asset') && hasAmount(value, 'balance');
}
