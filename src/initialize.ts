import { InMemoryAssetLedger } from './assets/asset-ledger.js';
import { Exchange } from './exchange.js';
import logger from './logger.js';
import { connectStateDatabase, loadState, MongoStateWriter } from './mongo.js';
import settings from './settings.js';
import { LedgerStore } from './store.js';

export interface ExchangeRuntime {
    store: LedgerStore;
    assets: InMemoryAssetLedger;
    exchange: Exchange;
    close(): Promise<void>;
}

export interface InitializeOptions {
    persist?: boolean;
    exchangeAccount?: string;
    logLevel?: string;
}

/**
 * Builds a ready exchange. With persistence on, state is loaded from MongoDB
 * first and every outermost commit is written back.
 */
export async function initializeExchange(options: InitializeOptions = {}): Promise<ExchangeRuntime> {
    const persist = options.persist ?? settings.persistState;
    if (options.logLevel) {
        logger.setLogLevel(options.logLevel);
    }
    const store = new LedgerStore();
    const assets = new InMemoryAssetLedger(store);
    const exchange = new Exchange(store, assets, { exchangeAccount: options.exchangeAccount });

    if (!persist) {
        logger.info('[initialize] Exchange ready (in-memory only)');
        return { store, assets, exchange, close: () => exchange.settled() };
    }

    try {
        const { client, database } = await connectStateDatabase();
        await loadState(database, store);
        exchange.attachWriter(new MongoStateWriter(database));
        logger.info('[initialize] Exchange ready, state persisted to MongoDB');
        return {
            store,
            assets,
            exchange,
            close: async () => {
                await exchange.settled();
                await client.close();
            },
        };
    } catch (error) {
        logger.error('[initialize] Failed to load exchange state:', error);
        throw error;
    }
}

export default initializeExchange;
