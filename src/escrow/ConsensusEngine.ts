/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LedgerContext } from '../context';
import { EscrowError } from '../errors';
import { getLogger } from '../logger';
import { approvalCount, EscrowStatus, type ApprovalPath, type EscrowRecord } from '../models/Escrow';
import type { FeeDistributor } from './FeeDistributor';

const logger = getLogger('ConsensusEngine');

export function withApproval(record: EscrowRecord, path: ApprovalPath): EscrowRecord {
    return path === 'release'
        ? { ...record, releaseApprovalCount: record.releaseApprovalCount + 1 }
        : { ...record, refundApprovalCount: record.refundApprovalCount + 1 };
}

export function quorumReached(record: EscrowRecord, path: ApprovalPath): boolean {
    return approvalCount(record, path) >= record.approvalsRequired;
}

/**
 * Release and refund are two independent tallies over the same verifier set.
 * Whichever reaches the threshold first settles the escrow in the same call.
 */
export class ConsensusEngine {
    constructor(private readonly distributor: FeeDistributor) {}

    async approve(ctx: LedgerContext, taskId: string, path: ApprovalPath, verifier: string): Promise<void> {
        const current = await ctx.escrows.getEscrow(taskId);
        if (!current || current.status !== EscrowStatus.FUNDED) {
            throw new EscrowError('InvalidEscrowState', `escrow ${taskId} is not funded`);
        }
        if (!(await ctx.escrows.isVerifier(taskId, verifier))) {
            throw new EscrowError('Unauthorized', `${verifier} is not a verifier for ${taskId}`, { subject: verifier });
        }
        if (await ctx.escrows.hasApproved(taskId, path, verifier)) {
            throw new EscrowError('AlreadyApproved', `${verifier} already approved ${path} for ${taskId}`, { subject: verifier });
        }

        await ctx.escrows.markApproved(taskId, path, verifier);
        const record = withApproval(current, path);
        await ctx.escrows.putEscrow(record);

        const approvals = approvalCount(record, path);
        ctx.emit({
            name: path === 'release' ? 'ReleaseApproved' : 'RefundApproved',
            payload: { taskId, path, verifier, approvals, approvalsRequired: record.approvalsRequired },
        });
        logger.info(`Escrow ${taskId}: ${path} approval ${approvals}/${record.approvalsRequired} from ${verifier}`);

        if (quorumReached(record, path)) {
            await this.distributor.finalize(ctx, record, path, verifier);
        }
    }
}
