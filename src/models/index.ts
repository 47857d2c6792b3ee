import type { AssetBalanceDoc } from './asset.js';
import type { EventDoc } from './event.js';
import type { PoolDoc } from './pool.js';
import type { OperatorDoc, ShareBalanceDoc } from './share.js';
import type { RegistryStateDoc } from './state.js';

export * from './asset.js';
export * from './event.js';
export * from './pool.js';
export * from './share.js';
export * from './state.js';

export interface CollectionDocs {
    pools: PoolDoc;
    shareBalances: ShareBalanceDoc;
    operators: OperatorDoc;
    assetBalances: AssetBalanceDoc;
    events: EventDoc;
    state: RegistryStateDoc;
}

export type CollectionName = keyof CollectionDocs;

export type StoredDoc = CollectionDocs[CollectionName];

export const COLLECTION_NAMES: readonly CollectionName[] = ['pools', 'shareBalances', 'operators', 'assetBalances', 'events', 'state'];
