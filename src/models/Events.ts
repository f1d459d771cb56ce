/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ApprovalPath } from './Escrow';

// Amounts are decimal strings; bigint has no JSON form.
export interface VerifierPayout {
    verifier: string;
    amount: string;
}

export interface EscrowCreatedEvent {
    taskId: string;
    depositor: string;
    payee: string;
    verifiers: string[];
    approvalsRequired: number;
    marketplaceFeeRate: number;
    verifierFeeRate: number;
    amount: string;
}

export interface ApprovalEvent {
    taskId: string;
    path: ApprovalPath;
    verifier: string;
    approvals: number;
    approvalsRequired: number;
}

export interface EscrowReleasedEvent {
    taskId: string;
    payee: string;
    payeeAmount: string;
    marketplaceFee: string;
    verifierFeeTotal: string;
    verifierPayouts: VerifierPayout[];
    treasuryFallback: string;
    approvals: number;
}

export interface EscrowRefundedEvent {
    taskId: string;
    depositor: string;
    refundAmount: string;
    verifierFeeTotal: string;
    verifierPayouts: VerifierPayout[];
    treasuryFallback: string;
    approvals: number;
}

export interface MintedEvent {
    account: string;
    amount: string;
}

export interface TransferredEvent {
    from: string;
    to: string;
    amount: string;
}

export interface LedgerEventMap {
    EscrowCreated: EscrowCreatedEvent;
    ReleaseApproved: ApprovalEvent;
    RefundApproved: ApprovalEvent;
    EscrowReleased: EscrowReleasedEvent;
    EscrowRefunded: EscrowRefundedEvent;
    Minted: MintedEvent;
    Transferred: TransferredEvent;
}

export type LedgerEventName = keyof LedgerEventMap;

export type LedgerEvent = {
    [K in LedgerEventName]: { name: K; payload: LedgerEventMap[K] };
}[LedgerEventName];

export const EVENT_BATCH = 'EscrowEventBatch';
