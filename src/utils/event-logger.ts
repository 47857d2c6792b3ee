import crypto from 'crypto';

import config from '../config.js';
import logger from '../logger.js';
import type { EventCategory, EventData, EventDoc } from '../models/index.js';
import type { LedgerStore } from '../store.js';
import type { CallContext } from '../transactions/types.js';
import { nextEventSeq } from './registry.js';

/**
 * Generate a deterministic id from arbitrary stringifiable parts.
 * Returns a hex string of length `len` (default 16).
 */
export function deterministicIdFrom(parts: Array<string | number | bigint>, len = 16): string {
    const joined = parts.map(p => String(p)).join('|');
    const hash = crypto.createHash('sha256').update(joined).digest('hex');
    return hash.substring(0, len);
}

/**
 * Appends an event to the store. Events live in the same savepoint as the
 * state change they describe, so they disappear with it on rollback.
 *
 * @param category - High-level category: 'pool', 'liquidity', 'share', 'swap'
 * @param action - Specific action: 'created', 'added', 'transfer', 'buy_token', etc.
 * @param data - Scalar fields only; amounts are passed as decimal strings
 */
export function logEvent(
    store: LedgerStore,
    ctx: CallContext,
    category: EventCategory,
    action: string,
    data: EventData
): EventDoc {
    const seq = nextEventSeq(store);
    const eventDocument: EventDoc = {
        _id: deterministicIdFrom([ctx.transactionId, category, action, seq], config.eventIdLength),
        category,
        action,
        type: `${category}_${action}`,
        timestamp: ctx.timestamp,
        actor: ctx.sender,
        data,
        transactionId: ctx.transactionId,
    };

    if (!store.events.insertOne(eventDocument)) {
        // Ids include a store-wide sequence number, so this means the store is corrupt
        throw new Error(`[event-logger] event id ${eventDocument._id} already exists`);
    }
    logger.debug(`[event-logger] ${eventDocument.type} by ${ctx.sender} in ${ctx.transactionId}: ${JSON.stringify(data)}`);
    return eventDocument;
}
