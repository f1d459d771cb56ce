/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { FEE_DENOMINATOR, requireConfig } from '../config';
import type { LedgerContext } from '../context';
import { isEscrowError, transferFailed } from '../errors';
import { getLogger } from '../logger';
import { EscrowStatus, type ApprovalPath, type EscrowRecord } from '../models/Escrow';
import type { VerifierPayout } from '../models/Events';
import type { ValueTransfer } from './ValueTransfer';

const logger = getLogger('FeeDistributor');

export interface ReleaseSplit {
    payeeAmount: bigint;
    marketplaceFee: bigint;
    verifierFeeTotal: bigint;
}

export interface RefundSplit {
    refundAmount: bigint;
    verifierFeeTotal: bigint;
}

export interface VerifierShare {
    verifier: string;
    amount: bigint;
}

export interface Payout {
    recipient: string;
    amount: bigint;
}

export function feeOf(amount: bigint, rate: number): bigint {
    return (amount * BigInt(rate)) / FEE_DENOMINATOR;
}

// Both fees truncate; the payee absorbs the rounding remainder.
export function computeReleaseSplit(amount: bigint, marketplaceFeeRate: number, verifierFeeRate: number): ReleaseSplit {
    const marketplaceFee = feeOf(amount, marketplaceFeeRate);
    const verifierFeeTotal = feeOf(amount, verifierFeeRate);
    return { payeeAmount: amount - marketplaceFee - verifierFeeTotal, marketplaceFee, verifierFeeTotal };
}

export function computeRefundSplit(amount: bigint, verifierFeeRate: number): RefundSplit {
    const verifierFeeTotal = feeOf(amount, verifierFeeRate);
    return { refundAmount: amount - verifierFeeTotal, verifierFeeTotal };
}

/**
 * Splits `total` evenly across approvers. The first `total mod n` approvers,
 * in verifier-list order, receive one extra unit.
 */
export function splitVerifierFee(total: bigint, approvers: readonly string[]): VerifierShare[] {
    if (approvers.length === 0) return [];
    const count = BigInt(approvers.length);
    const base = total / count;
    const remainder = total - base * count;
    return approvers.map((verifier, index) => ({
        verifier,
        amount: BigInt(index) < remainder ? base + 1n : base,
    }));
}

export interface Settlement {
    path: ApprovalPath;
    payouts: Payout[];
}

/**
 * Finalizes a funded escrow once a path reaches quorum: persists the terminal
 * record, pushes payouts, emits the settlement event and erases verifier
 * bookkeeping.
 */
export class FeeDistributor {
    constructor(private readonly transfer: ValueTransfer) {}

    async finalize(ctx: LedgerContext, record: EscrowRecord, path: ApprovalPath, decidingVerifier: string): Promise<Settlement> {
        const { treasury } = await requireConfig(ctx.stub);
        const verifiers = await ctx.escrows.getVerifiers(record.taskId);

        // The deciding flag was written in this transaction and is not readable yet.
        const approvers: string[] = [];
        for (const verifier of verifiers) {
            if (verifier === decidingVerifier || await ctx.escrows.hasApproved(record.taskId, path, verifier)) {
                approvers.push(verifier);
            }
        }

        const amount = BigInt(record.amount);
        const payouts: Payout[] = [];
        let verifierFeeTotal: bigint;
        let marketplaceFee = 0n;
        let primary: bigint;

        if (path === 'release') {
            const split = computeReleaseSplit(amount, record.marketplaceFeeRate, record.verifierFeeRate);
            ({ verifierFeeTotal, marketplaceFee } = split);
            primary = split.payeeAmount;
            payouts.push({ recipient: record.payee, amount: primary });
            payouts.push({ recipient: treasury, amount: marketplaceFee });
        } else {
            const split = computeRefundSplit(amount, record.verifierFeeRate);
            verifierFeeTotal = split.verifierFeeTotal;
            primary = split.refundAmount;
            payouts.push({ recipient: record.depositor, amount: primary });
        }

        const shares = splitVerifierFee(verifierFeeTotal, approvers);
        const treasuryFallback = shares.length === 0 ? verifierFeeTotal : 0n;
        payouts.push(...shares.map((share) => ({ recipient: share.verifier, amount: share.amount })));
        payouts.push({ recipient: treasury, amount: treasuryFallback });

        // State first, then value.
        record.status = path === 'release' ? EscrowStatus.RELEASED : EscrowStatus.REFUNDED;
        record.amount = '0';
        await ctx.escrows.putEscrow(record);

        const made = payouts.filter((payout) => payout.amount > 0n);
        await this.push(ctx, made);

        const verifierPayouts: VerifierPayout[] = shares.map((share) => ({
            verifier: share.verifier,
            amount: share.amount.toString(),
        }));

        if (path === 'release') {
            ctx.emit({
                name: 'EscrowReleased',
                payload: {
                    taskId: record.taskId,
                    payee: record.payee,
                    payeeAmount: primary.toString(),
                    marketplaceFee: marketplaceFee.toString(),
                    verifierFeeTotal: verifierFeeTotal.toString(),
                    verifierPayouts,
                    treasuryFallback: treasuryFallback.toString(),
                    approvals: approvers.length,
                },
            });
        } else {
            ctx.emit({
                name: 'EscrowRefunded',
                payload: {
                    taskId: record.taskId,
                    depositor: record.depositor,
                    refundAmount: primary.toString(),
                    verifierFeeTotal: verifierFeeTotal.toString(),
                    verifierPayouts,
                    treasuryFallback: treasuryFallback.toString(),
                    approvals: approvers.length,
                },
            });
        }

        await ctx.escrows.clearVerifiers(record.taskId, verifiers);

        logger.info(`Escrow ${record.taskId} ${record.status.toLowerCase()}: ${amount} split across ${made.length} payouts`);
        return { path, payouts: made };
    }

    private async push(ctx: LedgerContext, payouts: readonly Payout[]): Promise<void> {
        ctx.payoutInFlight = true;
        try {
            for (const { recipient, amount } of payouts) {
                try {
                    await this.transfer.pay(ctx, recipient, amount);
                } catch (err) {
                    logger.warn(`Payout of ${amount} to ${recipient} failed: ${String(err)}`);
                    if (isEscrowError(err, 'TransferFailed')) throw err;
                    throw transferFailed(recipient, err);
                }
            }
        } finally {
            ctx.payoutInFlight = false;
        }
    }
}
