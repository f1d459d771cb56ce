/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Stub } from '../context';
import { type EscrowRecord, EscrowRecordSchema, VerifierListSchema, type ApprovalPath } from '../models/Escrow';
import { fromBytes, isEmpty, toBytes } from '../serialization';

const ESCROW = 'escrow';
const VERIFIERS = 'escrow~verifiers';
const ELIGIBLE = 'escrow~verifier';
const APPROVAL = 'escrow~approval';

const FLAG = Uint8Array.of(1);

/**
 * World-state layout for escrows. One record per task, the ordered verifier
 * list, and one marker key per eligible verifier and per cast approval.
 *
 * Reads only see committed state (Fabric has no read-your-writes), so callers
 * must carry anything they wrote earlier in the same transaction themselves.
 */
export class EscrowLedger {
    constructor(private readonly stub: Stub) {}

    async getEscrow(taskId: string): Promise<EscrowRecord | undefined> {
        return fromBytes(await this.stub.getState(this.recordKey(taskId)), EscrowRecordSchema);
    }

    async exists(taskId: string): Promise<boolean> {
        return !isEmpty(await this.stub.getState(this.recordKey(taskId)));
    }

    async putEscrow(record: EscrowRecord): Promise<void> {
        await this.stub.putState(this.recordKey(record.taskId), toBytes(record));
    }

    async getVerifiers(taskId: string): Promise<string[]> {
        const verifiers = fromBytes(await this.stub.getState(this.verifiersKey(taskId)), VerifierListSchema);
        return verifiers ?? [];
    }

    async putVerifiers(taskId: string, verifiers: readonly string[]): Promise<void> {
        await this.stub.putState(this.verifiersKey(taskId), toBytes([...verifiers]));
        for (const verifier of verifiers) {
            await this.stub.putState(this.eligibleKey(taskId, verifier), FLAG);
        }
    }

    async isVerifier(taskId: string, who: string): Promise<boolean> {
        return !isEmpty(await this.stub.getState(this.eligibleKey(taskId, who)));
    }

    async hasApproved(taskId: string, path: ApprovalPath, verifier: string): Promise<boolean> {
        return !isEmpty(await this.stub.getState(this.approvalKey(taskId, path, verifier)));
    }

    async markApproved(taskId: string, path: ApprovalPath, verifier: string): Promise<void> {
        await this.stub.putState(this.approvalKey(taskId, path, verifier), FLAG);
    }

    // Drops the verifier list, eligibility and both approval tracks for a finalized task.
    async clearVerifiers(taskId: string, verifiers: readonly string[]): Promise<void> {
        for (const verifier of verifiers) {
            await this.stub.deleteState(this.eligibleKey(taskId, verifier));
            await this.stub.deleteState(this.approvalKey(taskId, 'release', verifier));
            await this.stub.deleteState(this.approvalKey(taskId, 'refund', verifier));
        }
        await this.stub.deleteState(this.verifiersKey(taskId));
    }

    private recordKey(taskId: string): string {
        return this.stub.createCompositeKey(ESCROW, [taskId]);
    }

    private verifiersKey(taskId: string): string {
        return this.stub.createCompositeKey(VERIFIERS, [taskId]);
    }

    private eligibleKey(taskId: string, verifier: string): string {
        return this.stub.createCompositeKey(ELIGIBLE, [taskId, verifier]);
    }

    private approvalKey(taskId: string, path: ApprovalPath, verifier: string): string {
        return this.stub.createCompositeKey(APPROVAL, [taskId, path, verifier]);
    }
}
