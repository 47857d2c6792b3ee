import logger from '../../logger.js';
import type { LedgerStore } from '../../store.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { CallContext, ExecutionEnv, ProcessOutcome, ValidationResult } from '../types.js';
import { setOperator } from './share-helpers.js';
import type { ShareUpdateOperatorsData, ShareUpdateOperatorsResult } from './share-interfaces.js';

const TAG = 'share-update-operators';

export function validateTx(data: ShareUpdateOperatorsData, _ctx: CallContext, _store: LedgerStore): ValidationResult {
    if (!Array.isArray(data.updates)) {
        return validate.invalid('ArithmeticError', 'updates must be a list', TAG);
    }
    for (const update of data.updates) {
        if (!validate.accountName(update.operator)) {
            return validate.invalid('Unauthorized', `Invalid operator account ${String(update.operator)}`, TAG);
        }
        if (update.action !== 'add' && update.action !== 'remove') {
            return validate.invalid('Unauthorized', `Unknown operator action ${String(update.action)}`, TAG);
        }
    }
    return { valid: true };
}

// Operators are always set for the caller's own shares
export function processTx(data: ShareUpdateOperatorsData, ctx: CallContext, env: ExecutionEnv): ProcessOutcome<ShareUpdateOperatorsResult> {
    for (const update of data.updates) {
        setOperator(env.store, ctx.sender, update.operator, update.action === 'add', ctx.timestamp);
        logEvent(env.store, ctx, 'share', 'operator_updated', {
            owner: ctx.sender,
            operator: update.operator,
            action: update.action,
        });
        logger.debug(`[${TAG}] ${ctx.sender} ${update.action === 'add' ? 'added' : 'removed'} operator ${update.operator}`);
    }
    return { result: { updated: data.updates.length }, effects: [] };
}
