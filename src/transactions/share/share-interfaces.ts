import type { TokenId } from '../../utils/token-id.js';

export interface ShareTransfer {
    shareTokenId: number;
    amount: string | bigint;
    from: string;
    to: string;
}

export interface ShareTransferData {
    transfers: ShareTransfer[];
}

export type OperatorAction = 'add' | 'remove';

export interface OperatorUpdate {
    operator: string;
    action: OperatorAction;
}

export interface ShareUpdateOperatorsData {
    updates: OperatorUpdate[];
}

export interface ShareTransferResult {
    transferred: number;
}

export interface ShareUpdateOperatorsResult {
    updated: number;
}

export interface ShareBalanceQuery {
    shareTokenId: number;
    holder: string;
}

export interface OperatorQuery {
    owner: string;
    operator: string;
}

export interface ShareTokenMetadata {
    shareTokenId: number;
    token: TokenId;
}
