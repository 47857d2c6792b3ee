import { hasNumber, isRecord } from './common.js';

export const REGISTRY_STATE_ID = 'registry';

// Counters owned by the exchange registry
export interface RegistryStateDoc {
    _id: typeof REGISTRY_STATE_ID;
    lastShareTokenId: number;
    eventSeq: number;
}

export function isRegistryStateDoc(value: unknown): value is RegistryStateDoc {
    if (!isRecord(value)) return false;
    return value._id === REGISTRY_STATE_ID && hasNumber(value, 'lastShareTokenId') && hasNumber(value, 'eventSeq');
}
