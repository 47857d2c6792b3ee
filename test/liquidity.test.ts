import assert from 'assert';
import { describe, it } from 'node:test';

import { BASE_ASSET, tokenAsset } from '../src/assets/asset-ledger.js';
import { createFixture, rejectsWith, reserves, TOKEN_A } from './helpers.js';

describe('addLiquidity', () => {
    it('creates the pool on the first deposit', () => {
        const fixture = createFixture();
        fixture.fund('alice', 100n, [[TOKEN_A, 400n]]);

        const result = fixture.exchange.addLiquidity(fixture.ctx('alice'), {
            token: TOKEN_A,
            baseAmountDesired: '100',
            tokenAmountDesired: '400',
            minShares: '200',
        });

        assert.deepStrictEqual(result, {
            token: TOKEN_A,
            shareTokenId: 1,
            baseAmount: 100n,
            tokenAmount: 400n,
            shares: 200n,
            poolCreated: true,
        });
        assert.deepStrictEqual(reserves(fixture, TOKEN_A), [100n, 400n]);
        assert.strictEqual(fixture.assets.balanceOf('exchange', BASE_ASSET), 100n);
        assert.strictEqual(fixture.assets.balanceOf('exchange', tokenAsset(TOKEN_A)), 400n);
        assert.strictEqual(fixture.assets.balanceOf('alice', BASE_ASSET), 0n);
    });

    it('takes only what matches the current ratio', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);
        fixture.fund('bob', 500n, [[TOKEN_A, 800n]]);

        const result = fixture.exchange.addLiquidity(fixture.ctx('bob'), {
            token: TOKEN_A,
            baseAmountDesired: 500n,
            tokenAmountDesired: 800n,
            minShares: 0n,
        });

        assert.strictEqual(result.shares, 500n);
        assert.strictEqual(result.baseAmount, 500n);
        assert.strictEqual(result.tokenAmount, 500n);
        assert.strictEqual(result.poolCreated, false);
        assert.deepStrictEqual(reserves(fixture, TOKEN_A), [1500n, 1500n]);
        // The unmatched 300 tokens never leave the provider
        assert.strictEqual(fixture.assets.balanceOf('bob', tokenAsset(TOKEN_A)), 300n);
        assert.strictEqual(fixture.exchange.view('bob', TOKEN_A).holderShares, 500n);
    });

    it('rounds the non-binding side up after a trade moved the price', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);
        fixture.fund('trader', 100n);
        fixture.exchange.swapExactBaseForToken(fixture.ctx('trader'), TOKEN_A, { amountIn: 100n, minAmountOut: 0n });
        fixture.fund('bob', 1000n, [[TOKEN_A, 100n]]);

        const result = fixture.exchange.addLiquidity(fixture.ctx('bob'), {
            token: TOKEN_A,
            baseAmountDesired: 1000n,
            tokenAmountDesired: 100n,
            minShares: 109n,
        });

        assert.strictEqual(result.baseAmount, 121n);
        assert.strictEqual(result.tokenAmount, 100n);
        assert.strictEqual(result.shares, 109n);
        assert.deepStrictEqual(reserves(fixture, TOKEN_A), [1221n, 1010n]);
    });

    it('rejects a deposit that mints no shares', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);
        fixture.fund('trader', 100n);
        fixture.exchange.swapExactBaseForToken(fixture.ctx('trader'), TOKEN_A, { amountIn: 100n, minAmountOut: 0n });
        fixture.fund('bob', 1n, [[TOKEN_A, 1000n]]);

        assert.throws(
            () => fixture.exchange.addLiquidity(fixture.ctx('bob'), { token: TOKEN_A, baseAmountDesired: 1n, tokenAmountDesired: 1000n, minShares: 0n }),
            rejectsWith('RatioMismatch')
        );
        assert.deepStrictEqual(reserves(fixture, TOKEN_A), [1100n, 910n]);
    });

    it('enforces minShares and leaves everything untouched', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);
        fixture.fund('bob', 500n, [[TOKEN_A, 800n]]);
        const eventCount = fixture.store.events.count();

        assert.throws(
            () => fixture.exchange.addLiquidity(fixture.ctx('bob'), { token: TOKEN_A, baseAmountDesired: 500n, tokenAmountDesired: 800n, minShares: 501n }),
            rejectsWith('SlippageExceeded')
        );
        assert.deepStrictEqual(reserves(fixture, TOKEN_A), [1000n, 1000n]);
        assert.strictEqual(fixture.exchange.view('bob', TOKEN_A).holderShares, 0n);
        assert.strictEqual(fixture.assets.balanceOf('bob', BASE_ASSET), 500n);
        assert.strictEqual(fixture.store.events.count(), eventCount);
    });

    it('rejects zero and malformed amounts', () => {
        const fixture = createFixture();
        fixture.fund('alice', 100n, [[TOKEN_A, 100n]]);

        assert.throws(
            () => fixture.exchange.addLiquidity(fixture.ctx('alice'), { token: TOKEN_A, baseAmountDesired: 0n, tokenAmountDesired: 100n, minShares: 0n }),
            rejectsWith('ZeroAmount')
        );
        assert.throws(
            () => fixture.exchange.addLiquidity(fixture.ctx('alice'), { token: TOKEN_A, baseAmountDesired: '1e3', tokenAmountDesired: 100n, minShares: 0n }),
            rejectsWith('ArithmeticError')
        );
        assert.throws(
            () => fixture.exchange.addLiquidity(fixture.ctx('alice'), { token: TOKEN_A, baseAmountDesired: 100n, tokenAmountDesired: '18446744073709551616', minShares: 0n }),
            rejectsWith('ArithmeticError')
        );
    });

    it('fails with TransferFailed when the provider cannot pay', () => {
        const fixture = createFixture();
        fixture.fund('alice', 100n, [[TOKEN_A, 399n]]);

        assert.throws(
            () => fixture.exchange.addLiquidity(fixture.ctx('alice'), { token: TOKEN_A, baseAmountDesired: 100n, tokenAmountDesired: 400n, minShares: 0n }),
            rejectsWith('TransferFailed')
        );
        assert.throws(() => fixture.exchange.view('alice', TOKEN_A), rejectsWith('PoolNotFound'));
        assert.strictEqual(fixture.assets.balanceOf('alice', BASE_ASSET), 100n);
        assert.strictEqual(fixture.store.events.count(), 0);
        assert.strictEqual(fixture.exchange.getState().lastShareTokenId, 0);
    });

    it('fails with ArithmeticError when the deposit would push a reserve past 2^64 - 1', () => {
        const fixture = createFixture();
        const nearMax = 2n ** 64n - 11n;
        fixture.seed('alice', TOKEN_A, nearMax, nearMax);
        fixture.fund('bob', 100n, [[TOKEN_A, 100n]]);
        const eventCount = fixture.store.events.count();

        assert.throws(
            () => fixture.exchange.addLiquidity(fixture.ctx('bob'), { token: TOKEN_A, baseAmountDesired: 100n, tokenAmountDesired: 100n, minShares: 0n }),
            rejectsWith('ArithmeticError')
        );
        const view = fixture.exchange.view('bob', TOKEN_A);
        assert.deepStrictEqual([view.baseReserve, view.tokenReserve, view.shareSupply, view.holderShares], [nearMax, nearMax, nearMax, 0n]);
        assert.strictEqual(fixture.assets.balanceOf('bob', BASE_ASSET), 100n);
        assert.strictEqual(fixture.assets.balanceOf('bob', tokenAsset(TOKEN_A)), 100n);
        assert.strictEqual(fixture.store.events.count(), eventCount);
    });
});

describe('removeLiquidity', () => {
    it('pays out the proportional share of both reserves', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);
        fixture.fund('trader', 100n);
        fixture.exchange.swapExactBaseForToken(fixture.ctx('trader'), TOKEN_A, { amountIn: 100n, minAmountOut: 90n });

        const result = fixture.exchange.removeLiquidity(fixture.ctx('alice'), {
            token: TOKEN_A,
            shareAmount: 500n,
            minBaseAmount: 550n,
            minTokenAmount: 455n,
        });

        assert.deepStrictEqual(result, { token: TOKEN_A, shareTokenId: 1, sharesBurned: 500n, baseAmount: 550n, tokenAmount: 455n });
        assert.deepStrictEqual(reserves(fixture, TOKEN_A), [550n, 455n]);
        const view = fixture.exchange.view('alice', TOKEN_A);
        assert.strictEqual(view.shareSupply, 500n);
        assert.strictEqual(view.holderShares, 500n);
        assert.strictEqual(fixture.assets.balanceOf('alice', BASE_ASSET), 550n);
        assert.strictEqual(fixture.assets.balanceOf('alice', tokenAsset(TOKEN_A)), 455n);
    });

    it('empties the pool on a full withdrawal and allows re-seeding', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);

        fixture.exchange.removeLiquidity(fixture.ctx('alice'), { token: TOKEN_A, shareAmount: 1000n, minBaseAmount: 0n, minTokenAmount: 0n });

        const emptied = fixture.exchange.view('alice', TOKEN_A);
        assert.deepStrictEqual(
            [emptied.baseReserve, emptied.tokenReserve, emptied.shareSupply, emptied.holderShares],
            [0n, 0n, 0n, 0n]
        );
        assert.strictEqual(fixture.store.shareBalances.count(), 0);
        fixture.fund('trader', 100n);
        assert.throws(
            () => fixture.exchange.swapExactBaseForToken(fixture.ctx('trader'), TOKEN_A, { amountIn: 100n, minAmountOut: 0n }),
            rejectsWith('PoolNotFound')
        );

        fixture.fund('bob', 100n, [[TOKEN_A, 400n]]);
        const reseeded = fixture.exchange.addLiquidity(fixture.ctx('bob'), {
            token: TOKEN_A,
            baseAmountDesired: 100n,
            tokenAmountDesired: 400n,
            minShares: 0n,
        });
        assert.strictEqual(reseeded.shares, 200n);
        assert.strictEqual(reseeded.poolCreated, false);
        assert.strictEqual(reseeded.shareTokenId, 1);
    });

    it('rejects burning more shares than the caller holds', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);

        assert.throws(
            () => fixture.exchange.removeLiquidity(fixture.ctx('bob'), { token: TOKEN_A, shareAmount: 1n, minBaseAmount: 0n, minTokenAmount: 0n }),
            rejectsWith('InsufficientShares')
        );
        assert.throws(
            () => fixture.exchange.removeLiquidity(fixture.ctx('alice'), { token: TOKEN_A, shareAmount: 1001n, minBaseAmount: 0n, minTokenAmount: 0n }),
            rejectsWith('InsufficientShares')
        );
        assert.strictEqual(fixture.exchange.view('alice', TOKEN_A).holderShares, 1000n);
        assert.strictEqual(fixture.exchange.view('alice', TOKEN_A).shareSupply, 1000n);
        assert.strictEqual(fixture.store.events.find(event => event.type === 'share_burned').length, 0);
    });

    it('enforces the minimum outputs', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);

        assert.throws(
            () => fixture.exchange.removeLiquidity(fixture.ctx('alice'), { token: TOKEN_A, shareAmount: 500n, minBaseAmount: 500n, minTokenAmount: 501n }),
            rejectsWith('SlippageExceeded')
        );
        assert.strictEqual(fixture.exchange.view('alice', TOKEN_A).holderShares, 1000n);
        assert.deepStrictEqual(reserves(fixture, TOKEN_A), [1000n, 1000n]);
    });

    it('rejects removal from a pool that does not exist', () => {
        const fixture = createFixture();

        assert.throws(
            () => fixture.exchange.removeLiquidity(fixture.ctx('alice'), { token: TOKEN_A, shareAmount: 1n, minBaseAmount: 0n, minTokenAmount: 0n }),
            rejectsWith('PoolNotFound')
        );
    });

    it('gives back no more than was deposited', () => {
        const fixture = createFixture();
        fixture.seed('alice', TOKEN_A, 1000n, 1000n);
        fixture.fund('trader', 100n);
        fixture.exchange.swapExactBaseForToken(fixture.ctx('trader'), TOKEN_A, { amountIn: 100n, minAmountOut: 0n });
        fixture.fund('bob', 1000n, [[TOKEN_A, 100n]]);

        const added = fixture.exchange.addLiquidity(fixture.ctx('bob'), { token: TOKEN_A, baseAmountDesired: 1000n, tokenAmountDesired: 100n, minShares: 0n });
        const removed = fixture.exchange.removeLiquidity(fixture.ctx('bob'), { token: TOKEN_A, shareAmount: added.shares, minBaseAmount: 0n, minTokenAmount: 0n });

        // floor(1221 * 109 / 1109) and floor(1010 * 109 / 1109)
        assert.strictEqual(removed.baseAmount, 120n);
        assert.strictEqual(removed.tokenAmount, 99n);
        assert.ok(removed.baseAmount <= added.baseAmount);
        assert.ok(removed.tokenAmount <= added.tokenAmount);
    });
});
