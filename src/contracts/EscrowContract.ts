/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Info, Returns, Transaction } from 'fabric-contract-api';
import { readConfig, requireConfig, writeConfig } from '../config';
import { LedgerContext } from '../context';
import { EscrowError } from '../errors';
import { ConsensusEngine } from '../escrow/ConsensusEngine';
import { FeeDistributor } from '../escrow/FeeDistributor';
import { LedgerTransfer, type ValueTransfer } from '../escrow/ValueTransfer';
import { getLogger } from '../logger';
import { ApprovalPathSchema, emptyEscrow, EscrowStatus, type ApprovalPath, type EscrowRecord } from '../models/Escrow';
import { toJson } from '../serialization';
import { parseAmount, parseFeeRates, parseVerifierSet, requirePrincipal } from '../validation';
import { BaseContract } from './BaseContract';

const logger = getLogger('EscrowContract');

@Info({ title: 'EscrowContract', description: 'Multi-verifier task escrow with quorum settlement' })
export class EscrowContract extends BaseContract {
    private readonly consensus: ConsensusEngine;

    constructor(name = 'EscrowContract', transfer: ValueTransfer = new LedgerTransfer()) {
        super(name);
        this.consensus = new ConsensusEngine(new FeeDistributor(transfer));
    }

    @Transaction()
    async Initialize(ctx: LedgerContext, treasury: string): Promise<void> {
        requirePrincipal(treasury, 'treasury');
        if (await readConfig(ctx.stub)) {
            throw new EscrowError('AlreadyInitialized', 'chaincode is already initialized');
        }

        const client = this.getClient(ctx);
        await writeConfig(ctx.stub, { treasury, minterMspId: client.mspId, initializedBy: client.id });
        logger.info(`Initialized with treasury ${treasury}, minter MSP ${client.mspId}`);
    }

    @Transaction(false)
    @Returns('string')
    async GetConfig(ctx: LedgerContext): Promise<string> {
        return toJson(await requireConfig(ctx.stub));
    }

    @Transaction()
    async CreateEscrow(
        ctx: LedgerContext,
        taskId: string,
        payee: string,
        verifiersJson: string, // JSON array of principals, e.g. '["x509::alice","x509::bob"]'
        approvalsRequired: string,
        marketplaceFeeRate: string,
        verifierFeeRate: string,
        amount: string
    ): Promise<void> {
        await requireConfig(ctx.stub);
        this.assertNotReentered(ctx);
        const depositor = this.getClient(ctx).id;

        // 1. Validate inputs
        requirePrincipal(payee, 'payee');
        const deposit = parseAmount(amount);
        if (await ctx.escrows.exists(taskId)) {
            throw new EscrowError('EscrowAlreadyExists', `escrow ${taskId} already exists`);
        }
        const fees = parseFeeRates(marketplaceFeeRate, verifierFeeRate);
        const quorum = parseVerifierSet(verifiersJson, approvalsRequired);

        // 2. Lock the deposit
        await ctx.tokens.lock(depositor, deposit);

        // 3. Write record and verifier set
        const record: EscrowRecord = {
            taskId,
            docType: 'escrow',
            depositor,
            payee,
            amount: deposit.toString(),
            ...fees,
            status: EscrowStatus.FUNDED,
            approvalsRequired: quorum.approvalsRequired,
            releaseApprovalCount: 0,
            refundApprovalCount: 0,
        };
        await ctx.escrows.putEscrow(record);
        await ctx.escrows.putVerifiers(taskId, quorum.verifiers);

        ctx.emit({
            name: 'EscrowCreated',
            payload: {
                taskId,
                depositor,
                payee,
                verifiers: quorum.verifiers,
                approvalsRequired: quorum.approvalsRequired,
                ...fees,
                amount: record.amount,
            },
        });
        logger.info(`Escrow ${taskId} funded with ${deposit} by ${depositor}, quorum ${quorum.approvalsRequired}/${quorum.verifiers.length}`);
    }

    @Transaction()
    async ApproveRelease(ctx: LedgerContext, taskId: string): Promise<void> {
        await this.approve(ctx, taskId, 'release');
    }

    @Transaction()
    async ApproveRefund(ctx: LedgerContext, taskId: string): Promise<void> {
        await this.approve(ctx, taskId, 'refund');
    }

    @Transaction(false)
    @Returns('string')
    async GetEscrow(ctx: LedgerContext, taskId: string): Promise<string> {
        const record = await ctx.escrows.getEscrow(taskId);
        return toJson(record ?? emptyEscrow(taskId));
    }

    @Transaction(false)
    @Returns('string')
    async GetVerifiers(ctx: LedgerContext, taskId: string): Promise<string> {
        return toJson(await ctx.escrows.getVerifiers(taskId));
    }

    @Transaction(false)
    @Returns('boolean')
    async HasApproved(ctx: LedgerContext, taskId: string, path: string, verifier: string): Promise<boolean> {
        const parsed = ApprovalPathSchema.safeParse(path);
        if (!parsed.success) {
            throw new EscrowError('InvalidArgument', `unknown approval path "${path}"`);
        }
        return ctx.escrows.hasApproved(taskId, parsed.data, verifier);
    }

    private async approve(ctx: LedgerContext, taskId: string, path: ApprovalPath): Promise<void> {
        this.assertNotReentered(ctx);
        await this.consensus.approve(ctx, taskId, path, this.getClient(ctx).id);
    }
}
