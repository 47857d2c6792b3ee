import assert from 'assert';
import { describe, it } from 'node:test';

import {
    amountAfterFee,
    calculateInitialShares,
    calculateWithdrawal,
    getOutputAmountBigInt,
    matchLiquidityRatio,
} from '../src/utils/pool.js';
import { rejectsWith } from './helpers.js';

describe('swap output', () => {
    it('takes a 1% fee from the input', () => {
        assert.strictEqual(amountAfterFee(100n), 99n);
        assert.strictEqual(amountAfterFee(10000n), 9900n);
        assert.strictEqual(amountAfterFee(1n), 0n);
    });

    it('getOutputAmountBigInt basic swap', () => {
        // floor(1000 * 99 / 1099)
        assert.strictEqual(getOutputAmountBigInt(100n, 1000n, 1000n), 90n);
        // floor(1000 * 990 / 1990)
        assert.strictEqual(getOutputAmountBigInt(1000n, 1000n, 1000n), 497n);
    });

    it('returns 0 when nothing can come out', () => {
        assert.strictEqual(getOutputAmountBigInt(0n, 1000n, 1000n), 0n);
        assert.strictEqual(getOutputAmountBigInt(100n, 0n, 1000n), 0n);
        assert.strictEqual(getOutputAmountBigInt(100n, 1000n, 0n), 0n);
        assert.strictEqual(getOutputAmountBigInt(1n, 1000n, 1000n), 0n);
    });
});

describe('liquidity math', () => {
    it('mints floor(sqrt(base * token)) for a first deposit', () => {
        assert.strictEqual(calculateInitialShares(100n, 400n), 200n);
        assert.strictEqual(calculateInitialShares(1000n, 1000n), 1000n);
        assert.strictEqual(calculateInitialShares(1n, 2n), 1n);
        assert.strictEqual(calculateInitialShares(2000n, 1000n), 1414n);
    });

    it('binds on the base side when it is proportionally smaller', () => {
        assert.deepStrictEqual(matchLiquidityRatio(500n, 800n, 1000n, 1000n, 1000n), {
            baseAmount: 500n,
            tokenAmount: 500n,
            shares: 500n,
            bindingSide: 'base',
        });
    });

    it('binds on the token side and rounds the base side up', () => {
        // base = ceil(100 * 1100 / 910), shares = floor(1000 * 100 / 910)
        assert.deepStrictEqual(matchLiquidityRatio(1000n, 100n, 1100n, 910n, 1000n), {
            baseAmount: 121n,
            tokenAmount: 100n,
            shares: 109n,
            bindingSide: 'token',
        });
    });

    it('lets the base side bind on an exact tie', () => {
        assert.deepStrictEqual(matchLiquidityRatio(100n, 200n, 1000n, 2000n, 500n), {
            baseAmount: 100n,
            tokenAmount: 200n,
            shares: 50n,
            bindingSide: 'base',
        });
    });

    it('reports zero shares for a deposit too small to mint', () => {
        const matched = matchLiquidityRatio(1n, 1000n, 1100n, 910n, 1000n);
        assert.strictEqual(matched.shares, 0n);
        assert.strictEqual(matched.tokenAmount, 1n);
    });

    it('splits reserves proportionally on withdrawal, rounding down', () => {
        assert.deepStrictEqual(calculateWithdrawal(500n, 1100n, 910n, 1000n), { baseAmount: 550n, tokenAmount: 455n });
        assert.deepStrictEqual(calculateWithdrawal(1n, 5n, 5n, 10n), { baseAmount: 0n, tokenAmount: 0n });
        assert.deepStrictEqual(calculateWithdrawal(10n, 5n, 7n, 10n), { baseAmount: 5n, tokenAmount: 7n });
    });

    it('fails on an empty share supply', () => {
        assert.throws(() => calculateWithdrawal(1n, 5n, 5n, 0n), rejectsWith('ArithmeticError'));
    });
});
