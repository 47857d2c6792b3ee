import { REGISTRY_STATE_ID, type RegistryStateDoc } from '../models/index.js';
import type { LedgerStore, UpdateChanges } from '../store.js';

export function getRegistryState(store: LedgerStore): RegistryStateDoc {
    return store.state.findOne(REGISTRY_STATE_ID) ?? { _id: REGISTRY_STATE_ID, lastShareTokenId: 0, eventSeq: 0 };
}

export function updateRegistryState(store: LedgerStore, changes: UpdateChanges<RegistryStateDoc>): void {
    if (store.state.updateOne(REGISTRY_STATE_ID, changes)) return;
    store.state.insertOne({ ...getRegistryState(store), ...changes.$set });
}

// Share token ids are handed out sequentially starting at 1
export function allocateShareTokenId(store: LedgerStore): number {
    const shareTokenId = getRegistryState(store).lastShareTokenId + 1;
    updateRegistryState(store, { $set: { lastShareTokenId: shareTokenId } });
    return shareTokenId;
}

export function nextEventSeq(store: LedgerStore): number {
    const eventSeq = getRegistryState(store).eventSeq + 1;
    updateRegistryState(store, { $set: { eventSeq } });
    return eventSeq;
}
