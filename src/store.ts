import cloneDeep from 'clone-deep';

import logger from './logger.js';
import type {
    AssetBalanceDoc,
    CollectionName,
    EventDoc,
    OperatorDoc,
    PoolDoc,
    RegistryStateDoc,
    ShareBalanceDoc,
    StoredDoc,
} from './models/index.js';

export interface StoreChange {
    collection: CollectionName;
    id: string;
    doc: StoredDoc | null; // null when the document was deleted
}

// Receives the changes of outermost commits, in commit order
export interface StateWriter {
    persist(changes: StoreChange[]): Promise<void>;
}

export interface UpdateChanges<T extends StoredDoc> {
    $set: Partial<Omit<T, '_id'>>;
}

export interface UndoEntry {
    collection: CollectionName;
    id: string;
    restore: () => void;
    current: () => StoredDoc | null;
}

type Frame = Map<string, UndoEntry>;

export interface Journal {
    readonly depth: number;
    begin(): void;
    commit(): void;
    record(entry: UndoEntry): void;
}

/**
 * One keyed collection of the ledger store. Reads return clones; every write
 * records the document's prior version in the innermost open savepoint the
 * first time the document is touched there.
 */
export class StoreCollection<T extends StoredDoc> {
    private readonly docs = new Map<string, T>();

    constructor(readonly name: CollectionName, private readonly journal: Journal) {}

    findOne(id: string): T | null {
        const doc = this.docs.get(id);
        return doc ? cloneDeep(doc) : null;
    }

    // Ordered by _id
    find(predicate: (doc: T) => boolean = () => true): T[] {
        return [...this.docs.keys()]
            .sort()
            .flatMap(id => {
                const doc = this.docs.get(id);
                return doc && predicate(doc) ? [cloneDeep(doc)] : [];
            });
    }

    count(): number {
        return this.docs.size;
    }

    insertOne(document: T): boolean {
        if (this.docs.has(document._id)) {
            logger.debug(`[ledger-store] insertOne skipped, ${this.name}/${document._id} exists`);
            return false;
        }
        this.write(document._id, () => this.docs.set(document._id, cloneDeep(document)));
        return true;
    }

    updateOne(id: string, changes: UpdateChanges<T>): boolean {
        const target = this.docs.get(id);
        if (!target) return false;
        this.write(id, () => Object.assign(target, cloneDeep(changes.$set)));
        return true;
    }

    deleteOne(id: string): boolean {
        if (!this.docs.has(id)) return false;
        this.write(id, () => this.docs.delete(id));
        return true;
    }

    // Loads a persisted document without journaling it
    hydrate(document: T): void {
        this.docs.set(document._id, cloneDeep(document));
    }

    private write(id: string, apply: () => void): void {
        // A write outside any savepoint commits on its own
        const standalone = this.journal.depth === 0;
        if (standalone) this.journal.begin();

        const existing = this.docs.get(id);
        const prior = existing ? cloneDeep(existing) : null;
        this.journal.record({
            collection: this.name,
            id,
            restore: () => {
                if (prior) this.docs.set(id, prior);
                else this.docs.delete(id);
            },
            current: () => {
                const doc = this.docs.get(id);
                return doc ? cloneDeep(doc) : null;
            },
        });
        apply();

        if (standalone) this.journal.commit();
    }
}

/**
 * In-memory state of the exchange with nested savepoints.
 *
 * begin() opens a savepoint, commit() folds it into its parent (or, at the
 * outermost level, publishes the touched documents as changes for the
 * persistence layer), rollback() restores every document the savepoint
 * touched.
 */
export class LedgerStore implements Journal {
    readonly pools: StoreCollection<PoolDoc>;
    readonly shareBalances: StoreCollection<ShareBalanceDoc>;
    readonly operators: StoreCollection<OperatorDoc>;
    readonly assetBalances: StoreCollection<AssetBalanceDoc>;
    readonly events: StoreCollection<EventDoc>;
    readonly state: StoreCollection<RegistryStateDoc>;

    private readonly frames: Frame[] = [];
    private changes: StoreChange[] = [];

    constructor() {
        this.pools = new StoreCollection<PoolDoc>('pools', this);
        this.shareBalances = new StoreCollection<ShareBalanceDoc>('shareBalances', this);
        this.operators = new StoreCollection<OperatorDoc>('operators', this);
        this.assetBalances = new StoreCollection<AssetBalanceDoc>('assetBalances', this);
        this.events = new StoreCollection<EventDoc>('events', this);
        this.state = new StoreCollection<RegistryStateDoc>('state', this);
    }

    get depth(): number {
        return this.frames.length;
    }

    begin(): void {
        this.frames.push(new Map());
    }

    record(entry: UndoEntry): void {
        const frame = this.frames[this.frames.length - 1];
        if (!frame) {
            throw new Error('[ledger-store] write recorded without an open savepoint');
        }
        const key = `${entry.collection}/${entry.id}`;
        if (!frame.has(key)) frame.set(key, entry);
    }

    commit(): void {
        const frame = this.frames.pop();
        if (!frame) throw new Error('[ledger-store] commit without an open savepoint');

        const parent = this.frames[this.frames.length - 1];
        if (parent) {
            // The parent keeps its own, older snapshot of documents it already touched
            for (const [key, entry] of frame) {
                if (!parent.has(key)) parent.set(key, entry);
            }
            return;
        }

        for (const entry of frame.values()) {
            this.changes.push({ collection: entry.collection, id: entry.id, doc: entry.current() });
        }
        logger.trace(`[ledger-store] committed ${frame.size} document(s)`);
    }

    rollback(): void {
        const frame = this.frames.pop();
        if (!frame) throw new Error('[ledger-store] rollback without an open savepoint');

        const entries = [...frame.values()].reverse();
        for (const entry of entries) entry.restore();
        logger.debug(`[ledger-store] rolled back ${entries.length} document(s) at depth ${this.frames.length + 1}`);
    }

    /**
     * Runs `fn` inside a savepoint that is always rolled back. Used for
     * read-only simulations such as quotes.
     */
    simulate<R>(fn: () => R): R {
        this.begin();
        try {
            return fn();
        } finally {
            this.rollback();
        }
    }

    hasPendingChanges(): boolean {
        return this.changes.length > 0;
    }

    // Changes published by outermost commits since the last call
    takeChanges(): StoreChange[] {
        const taken = this.changes;
        this.changes = [];
        return taken;
    }
}

export default LedgerStore;
