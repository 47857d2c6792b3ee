import { ExchangeError } from '../../errors.js';
import type { OperatorDoc } from '../../models/index.js';
import type { LedgerStore } from '../../store.js';
import { holderDocId } from '../../utils/token-id.js';
import { findPoolByShareTokenId } from '../pool/pool-helpers.js';
import type { Pool } from '../pool/pool-interfaces.js';

export function isOperatorOf(store: LedgerStore, owner: string, operator: string): boolean {
    return store.operators.findOne(holderDocId(owner, operator)) !== null;
}

export function setOperator(store: LedgerStore, owner: string, operator: string, enabled: boolean, since: string): void {
    const id = holderDocId(owner, operator);
    if (!enabled) {
        store.operators.deleteOne(id);
        return;
    }
    const doc: OperatorDoc = { _id: id, owner, operator, since };
    store.operators.insertOne(doc);
}

export function getShareTokenPool(store: LedgerStore, shareTokenId: number): Pool {
    const pool = findPoolByShareTokenId(store, shareTokenId);
    if (!pool) {
        throw new ExchangeError('PoolNotFound', `Unknown share token ${shareTokenId}`, { shareTokenId });
    }
    return pool;
}
