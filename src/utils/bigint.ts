import config from '../config.js';
import { ExchangeError } from '../errors.js';

// Stored amounts are left-padded so string order matches numeric order.
// Wide enough for any 128-bit intermediate written into an event.
const DB_DIGITS = 40;

export const MAX_AMOUNT: bigint = BigInt(config.maxAmount);
export const MAX_WIDE_VALUE: bigint = BigInt(config.maxWideValue);

/** Reads an amount back from its stored (possibly padded) decimal form. */
export function toBigInt(value: string | bigint): bigint {
    if (typeof value === 'bigint') return value;
    const digits = value.replace(/^0+(?=\d)/, '');
    return BigInt(digits);
}

export function toDbString(value: bigint): string {
    if (value < 0n) {
        throw new Error(`[bigint] cannot store negative value ${value}`);
    }
    const digits = value.toString();
    if (digits.length > DB_DIGITS) {
        throw new Error(`[bigint] ${digits} does not fit in ${DB_DIGITS} digits`);
    }
    return digits.padStart(DB_DIGITS, '0');
}

/**
 * Parse caller input into an amount. Anything that is not an unsigned
 * 64-bit integer is rejected with ArithmeticError.
 */
export function parseAmount(value: string | bigint, field: string): bigint {
    let parsed: bigint;
    try {
        parsed = typeof value === 'bigint' ? value : BigInt(value.trim());
    } catch {
        throw new ExchangeError('ArithmeticError', `${field} is not an integer: ${String(value)}`, { field });
    }
    return BigIntMath.narrow(parsed, field);
}

function overflow(operation: string, detail: string): ExchangeError {
    return new ExchangeError('ArithmeticError', `${operation} overflow: ${detail}`, { operation });
}

/**
 * Overflow-checked arithmetic. Products are computed in the wide
 * (128-bit) domain and narrowed to 64 bits only after the final division.
 */
export const BigIntMath = {
    narrow(value: bigint, label = 'value'): bigint {
        if (value < 0n) {
            throw new ExchangeError('ArithmeticError', `${label} is negative: ${value}`, { field: label });
        }
        if (value > MAX_AMOUNT) {
            throw new ExchangeError('ArithmeticError', `${label} exceeds the 64-bit amount range: ${value}`, { field: label });
        }
        return value;
    },

    add(a: bigint, b: bigint): bigint {
        const sum = a + b;
        if (sum > MAX_AMOUNT) throw overflow('add', `${a} + ${b}`);
        return sum;
    },

    sub(a: bigint, b: bigint): bigint {
        if (b > a) {
            throw new ExchangeError('ArithmeticError', `sub underflow: ${a} - ${b}`, { operation: 'sub' });
        }
        return a - b;
    },

    wideAdd(a: bigint, b: bigint): bigint {
        const sum = a + b;
        if (sum > MAX_WIDE_VALUE) throw overflow('wideAdd', `${a} + ${b}`);
        return sum;
    },

    wideMul(a: bigint, b: bigint): bigint {
        const product = a * b;
        if (product > MAX_WIDE_VALUE) throw overflow('wideMul', `${a} * ${b}`);
        return product;
    },

    // floor(a * b / divisor), narrowed to an amount
    mulDiv(a: bigint, b: bigint, divisor: bigint): bigint {
        if (divisor === 0n) {
            throw new ExchangeError('ArithmeticError', 'Division by zero', { operation: 'mulDiv' });
        }
        return this.narrow(this.wideMul(a, b) / divisor, 'mulDiv result');
    },

    // ceil(a * b / divisor), narrowed to an amount
    mulDivCeil(a: bigint, b: bigint, divisor: bigint): bigint {
        if (divisor === 0n) {
            throw new ExchangeError('ArithmeticError', 'Division by zero', { operation: 'mulDivCeil' });
        }
        const product = this.wideMul(a, b);
        const quotient = product / divisor;
        return this.narrow(product % divisor === 0n ? quotient : quotient + 1n, 'mulDivCeil result');
    },

    // Integer square root by Newton's method, rounding down
    sqrt(value: bigint): bigint {
        if (value < 0n) {
            throw new ExchangeError('ArithmeticError', 'Square root of negative numbers is not supported', { operation: 'sqrt' });
        }
        if (value < 2n) {
            return value;
        }

        let x = value;
        let y = (x + 1n) / 2n;
        while (y < x) {
            x = y;
            y = (x + value / x) / 2n;
        }
        return x;
    },
};
