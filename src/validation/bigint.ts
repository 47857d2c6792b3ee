import { MAX_AMOUNT } from '../utils/bigint.js';

/**
 * Validates a caller-supplied amount: a bigint or a decimal digit string
 * that fits the unsigned 64-bit amount range.
 * @param value - The value to validate
 * @param allowZero - Whether to allow zero value
 * @returns boolean indicating if value meets all constraints
 */
export default function validateAmount(value: unknown, allowZero = true): value is string | bigint {
    let numValue: bigint;
    if (typeof value === 'bigint') {
        numValue = value;
    } else if (typeof value === 'string' && /^[0-9]+$/.test(value.trim())) {
        numValue = BigInt(value.trim());
    } else {
        return false;
    }

    if (!allowZero && numValue === 0n) return false;
    if (numValue < 0n) return false;
    if (numValue > MAX_AMOUNT) return false;

    return true;
}
