/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export enum EscrowStatus {
    UNINITIALIZED = 'UNINITIALIZED',
    FUNDED = 'FUNDED',          // Deposit locked in custody
    RELEASED = 'RELEASED',      // Paid to payee
    REFUNDED = 'REFUNDED',      // Returned to depositor
}

export const APPROVAL_PATHS = ['release', 'refund'] as const;

export type ApprovalPath = (typeof APPROVAL_PATHS)[number];

export const ApprovalPathSchema = z.enum(APPROVAL_PATHS);

export const EscrowRecordSchema = z.object({
    taskId: z.string(),
    docType: z.literal('escrow'),

    depositor: z.string(),
    payee: z.string(),

    amount: z.string().regex(/^\d+$/),  // minor units
    marketplaceFeeRate: z.number().int().min(0),
    verifierFeeRate: z.number().int().min(0),

    status: z.nativeEnum(EscrowStatus),

    approvalsRequired: z.number().int().min(0),
    releaseApprovalCount: z.number().int().min(0),
    refundApprovalCount: z.number().int().min(0),
});

export type EscrowRecord = z.infer<typeof EscrowRecordSchema>;

export const VerifierListSchema = z.array(z.string());

export function emptyEscrow(taskId: string): EscrowRecord {
    return {
        taskId,
        docType: 'escrow',
        depositor: '',
        payee: '',
        amount: '0',
        marketplaceFeeRate: 0,
        verifierFeeRate: 0,
        status: EscrowStatus.UNINITIALIZED,
        approvalsRequired: 0,
        releaseApprovalCount: 0,
        refundApprovalCount: 0,
    };
}

export function approvalCount(record: EscrowRecord, path: ApprovalPath): number {
    return path === 'release' ? record.releaseApprovalCount : record.refundApprovalCount;
}
