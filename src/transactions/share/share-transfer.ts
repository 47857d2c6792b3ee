import { ExchangeError } from '../../errors.js';
import logger from '../../logger.js';
import type { LedgerStore } from '../../store.js';
import { parseAmount } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { moveShares } from '../pool/pool-helpers.js';
import type { CallContext, ExecutionEnv, ProcessOutcome, ValidationResult } from '../types.js';
import { getShareTokenPool, isOperatorOf } from './share-helpers.js';
import type { ShareTransferData, ShareTransferResult } from './share-interfaces.js';

const TAG = 'share-transfer';

export function validateTx(data: ShareTransferData, _ctx: CallContext, _store: LedgerStore): ValidationResult {
    if (!Array.isArray(data.transfers)) {
        return validate.invalid('ArithmeticError', 'transfers must be a list', TAG);
    }
    for (const transfer of data.transfers) {
        if (!Number.isInteger(transfer.shareTokenId) || transfer.shareTokenId < 1) {
            return validate.invalid('PoolNotFound', `Invalid share token id ${transfer.shareTokenId}`, TAG);
        }
        if (!validate.amount(transfer.amount)) {
            return validate.invalid('ArithmeticError', `Invalid amount ${String(transfer.amount)}`, TAG);
        }
        if (!validate.accountName(transfer.from) || !validate.accountName(transfer.to)) {
            return validate.invalid('Unauthorized', `Invalid account in transfer ${transfer.from} -> ${transfer.to}`, TAG);
        }
    }
    return { valid: true };
}

/**
 * Moves pool shares between holders. The caller must own the shares or be
 * an operator of the owner. A zero amount moves nothing but is still
 * authorized and logged.
 */
export function processTx(data: ShareTransferData, ctx: CallContext, env: ExecutionEnv): ProcessOutcome<ShareTransferResult> {
    for (const transfer of data.transfers) {
        const amount = parseAmount(transfer.amount, 'amount');
        const pool = getShareTokenPool(env.store, transfer.shareTokenId);

        if (transfer.from !== ctx.sender && !isOperatorOf(env.store, transfer.from, ctx.sender)) {
            throw new ExchangeError('Unauthorized', `${ctx.sender} may not move shares of ${transfer.from}`, {
                owner: transfer.from,
                sender: ctx.sender,
            });
        }

        if (amount > 0n) {
            moveShares(env.store, pool, transfer.from, transfer.to, amount);
        }
        logEvent(env.store, ctx, 'share', 'transfer', {
            shareTokenId: pool.shareTokenId,
            amount: amount.toString(),
            from: transfer.from,
            to: transfer.to,
        });
        logger.debug(`[${TAG}] ${amount} of share token ${pool.shareTokenId} from ${transfer.from} to ${transfer.to}`);
    }

    return { result: { transferred: data.transfers.length }, effects: [] };
}
