import { type Db, MongoClient } from 'mongodb';

import logger from './logger.js';
import {
    type CollectionName,
    COLLECTION_NAMES,
    isAssetBalanceDoc,
    isEventDoc,
    isOperatorDoc,
    isPoolDoc,
    isRegistryStateDoc,
    isShareBalanceDoc,
    type StoredDoc,
} from './models/index.js';
import { ProcessingQueue } from './processingQueue.js';
import settings from './settings.js';
import type { LedgerStore, StateWriter, StoreChange, StoreCollection } from './store.js';

export type StateWriteOperation =
    | { replaceOne: { filter: { _id: string }; replacement: Record<string, unknown>; upsert: true } }
    | { deleteOne: { filter: { _id: string } } };

// The slice of a MongoDB collection the state writer needs
export interface StateCollection {
    bulkWrite(operations: StateWriteOperation[]): Promise<void>;
    findAll(): Promise<unknown[]>;
}

export interface StateDatabase {
    collection(name: CollectionName): StateCollection;
}

export function fromDb(db: Db): StateDatabase {
    return {
        collection(name) {
            const collection = db.collection<{ _id: string }>(name);
            return {
                async bulkWrite(operations) {
                    if (operations.length === 0) return;
                    await collection.bulkWrite(operations, { ordered: true });
                },
                async findAll() {
                    return collection.find({}).toArray();
                },
            };
        },
    };
}

export function toWriteOperation(change: StoreChange): StateWriteOperation {
    if (!change.doc) {
        return { deleteOne: { filter: { _id: change.id } } };
    }
    return { replaceOne: { filter: { _id: change.id }, replacement: { ...change.doc }, upsert: true } };
}

// Keeps commit order within each collection
export function groupChanges(changes: StoreChange[]): Map<CollectionName, StateWriteOperation[]> {
    const grouped = new Map<CollectionName, StateWriteOperation[]>();
    for (const change of changes) {
        const operations = grouped.get(change.collection) ?? [];
        operations.push(toWriteOperation(change));
        grouped.set(change.collection, operations);
    }
    return grouped;
}

/**
 * Writes committed store changes to MongoDB. Batches are written one at a
 * time so a later batch never overtakes an earlier one.
 */
export class MongoStateWriter implements StateWriter {
    private readonly queue = new ProcessingQueue('state-writer');

    constructor(private readonly database: StateDatabase) {}

    persist(changes: StoreChange[]): Promise<void> {
        return this.queue.run(() => this.write(changes));
    }

    private async write(changes: StoreChange[]): Promise<void> {
        const start = Date.now();
        for (const [name, operations] of groupChanges(changes)) {
            await this.database.collection(name).bulkWrite(operations);
            logger.trace(`[mongo] ${name}: ${operations.length} operation(s) written`);
        }
        logger.debug(`[mongo] persisted ${changes.length} change(s) in ${Date.now() - start}ms`);
    }
}

async function hydrateCollection<T extends StoredDoc>(
    database: StateDatabase,
    target: StoreCollection<T>,
    isDoc: (value: unknown) => value is T
): Promise<number> {
    const documents = await database.collection(target.name).findAll();
    let loaded = 0;
    for (const document of documents) {
        if (!isDoc(document)) {
            logger.warn(`[mongo] skipping malformed document in ${target.name}: ${JSON.stringify(document)}`);
            continue;
        }
        target.hydrate(document);
        loaded++;
    }
    return loaded;
}

// Fills an empty store from the database
export async function loadState(database: StateDatabase, store: LedgerStore): Promise<void> {
    const counts: Record<CollectionName, number> = {
        pools: await hydrateCollection(database, store.pools, isPoolDoc),
        shareBalances: await hydrateCollection(database, store.shareBalances, isShareBalanceDoc),
        operators: await hydrateCollection(database, store.operators, isOperatorDoc),
        assetBalances: await hydrateCollection(database, store.assetBalances, isAssetBalanceDoc),
        events: await hydrateCollection(database, store.events, isEventDoc),
        state: await hydrateCollection(database, store.state, isRegistryStateDoc),
    };
    logger.info(`[mongo] state loaded: ${COLLECTION_NAMES.map(name => `${name}=${counts[name]}`).join(', ')}`);
}

async function addMongoIndexes(db: Db): Promise<void> {
    await db.collection('pools').createIndex({ shareTokenId: 1 }, { unique: true });
    await db.collection('shareBalances').createIndex({ holder: 1 });
    await db.collection('shareBalances').createIndex({ shareTokenId: 1 });
    await db.collection('operators').createIndex({ owner: 1 });
    await db.collection('events').createIndex({ transactionId: 1 });
    await db.collection('events').createIndex({ type: 1, timestamp: 1 });
}

export interface StateConnection {
    client: MongoClient;
    database: StateDatabase;
}

export async function connectStateDatabase(url = settings.mongoUrl, dbName = settings.mongoDb): Promise<StateConnection> {
    const client = new MongoClient(url, {});
    await client.connect();
    const db = client.db(dbName);
    logger.info(`[mongo] Connected to ${url}/${db.databaseName}`);
    await addMongoIndexes(db);
    return { client, database: fromDb(db) };
}
