import { hasString, isRecord, isScalarRecord, type Scalar } from './common.js';

export type EventCategory = 'pool' | 'liquidity' | 'share' | 'swap';

export type EventData = Record<string, Scalar>;

/**
 * Represents the structure of an event document to be stored.
 */
export interface EventDoc {
    _id: string;
    category: EventCategory;
    action: string;
    type: string; // category_action
    timestamp: string;
    actor: string;
    data: EventData;
    transactionId: string;
}

const EVENT_CATEGORIES: readonly string[] = ['pool', 'liquidity', 'share', 'swap'];

function isEventCategory(value: unknown): value is EventCategory {
    return typeof value === 'string' && EVENT_CATEGORIES.includes(value);
}

export function isEventDoc(value: unknown): value is EventDoc {
    if (!isRecord(value)) return false;
    return (
        hasString(value, '_id') &&
        isEventCategory(value.category) &&
        hasString(value, 'action') &&
        hasString(value, 'type') &&
        hasString(value, 'timestamp') &&
        hasString(value, 'actor') &&
        isScalarRecord(value.data) &&
        hasString(value, 'transactionId')
    );
}
