export const EXCHANGE_ERROR_CODES = [
    'PoolNotFound',
    'PoolExists',
    'ZeroAmount',
    'InsufficientReserve',
    'InsufficientShares',
    'InsufficientLiquidity',
    'RatioMismatch',
    'SlippageExceeded',
    'ArithmeticError',
    'TransferFailed',
    'Unauthorized',
] as const;

export type ExchangeErrorCode = (typeof EXCHANGE_ERROR_CODES)[number];

export type ErrorDetails = Record<string, string | number | boolean>;

/**
 * The only error type the exchange core raises. Every code aborts the whole
 * call; the store is rolled back before the error reaches the caller.
 */
export class ExchangeError extends Error {
    readonly code: ExchangeErrorCode;
    readonly details: ErrorDetails;

    constructor(code: ExchangeErrorCode, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExchangeError';
        this.code = code;
        this.details = details;
    }
}

export function isExchangeError(error: unknown, code?: ExchangeErrorCode): error is ExchangeError {
    return error instanceof ExchangeError && (code === undefined || error.code === code);
}

/**
 * Wraps anything thrown inside a call that is not already an ExchangeError.
 * Used only at the transaction boundary.
 */
export function toExchangeError(error: unknown, fallback: ExchangeErrorCode, context: string): ExchangeError {
    if (error instanceof ExchangeError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ExchangeError(fallback, `${context}: ${message}`, {}, { cause: error });
}
