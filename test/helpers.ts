import { BASE_ASSET, InMemoryAssetLedger, tokenAsset } from '../src/assets/asset-ledger.js';
import { type ExchangeErrorCode, isExchangeError } from '../src/errors.js';
import { Exchange, type ExchangeOptions } from '../src/exchange.js';
import { LedgerStore } from '../src/store.js';
import type { CallContext } from '../src/transactions/types.js';
import type { TokenId } from '../src/utils/token-id.js';

export const TOKEN_A: TokenId = { contract: 'token-a', id: '' };
export const TOKEN_B: TokenId = { contract: 'token-b', id: '01' };
export const TOKEN_C: TokenId = { contract: 'token-c', id: '' };

export const TIMESTAMP = '2024-05-01T12:00:00.000Z';

export interface Fixture {
    store: LedgerStore;
    assets: InMemoryAssetLedger;
    exchange: Exchange;
    ctx(sender: string): CallContext;
    fund(holder: string, base: bigint, tokens?: Array<[TokenId, bigint]>): void;
    seed(provider: string, token: TokenId, base: bigint, tokenAmount: bigint): void;
}

export function createFixture(options: ExchangeOptions = {}): Fixture {
    const store = new LedgerStore();
    const assets = new InMemoryAssetLedger(store);
    const exchange = new Exchange(store, assets, options);
    let counter = 0;

    const fixture: Fixture = {
        store,
        assets,
        exchange,
        ctx: (sender) => ({ sender, transactionId: `tx-${++counter}`, timestamp: TIMESTAMP }),
        fund: (holder, base, tokens = []) => {
            assets.credit(holder, BASE_ASSET, base);
            for (const [token, amount] of tokens) assets.credit(holder, tokenAsset(token), amount);
        },
        // Funds the provider with exactly the deposit and creates the pool
        seed: (provider, token, base, tokenAmount) => {
            fixture.fund(provider, base, [[token, tokenAmount]]);
            exchange.addLiquidity(fixture.ctx(provider), { token, baseAmountDesired: base, tokenAmountDesired: tokenAmount, minShares: 0n });
        },
    };
    return fixture;
}

export function rejectsWith(code: ExchangeErrorCode): (error: unknown) => boolean {
    return (error: unknown) => isExchangeError(error, code);
}

export function reserves(fixture: Fixture, token: TokenId): [bigint, bigint] {
    const view = fixture.exchange.view('nobody', token);
    return [view.baseReserve, view.tokenReserve];
}
