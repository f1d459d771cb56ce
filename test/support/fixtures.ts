import { EscrowContract } from '../../src/contracts/EscrowContract';
import { TokenContract } from '../../src/contracts/TokenContract';
import type { ValueTransfer } from '../../src/escrow/ValueTransfer';
import { EscrowRecordSchema, type EscrowRecord } from '../../src/models/Escrow';
import { WorldState, type TestIdentity } from './world';

export const E18 = 10n ** 18n;

export const admin: TestIdentity = { id: 'x509::CN=admin::CN=ca.org1', mspId: 'Org1MSP' };
export const depositor: TestIdentity = { id: 'x509::CN=depositor::CN=ca.org2', mspId: 'Org2MSP' };
export const payee: TestIdentity = { id: 'x509::CN=payee::CN=ca.org2', mspId: 'Org2MSP' };
export const verifierA: TestIdentity = { id: 'x509::CN=verifier-a::CN=ca.org2', mspId: 'Org2MSP' };
export const verifierB: TestIdentity = { id: 'x509::CN=verifier-b::CN=ca.org2', mspId: 'Org2MSP' };
export const verifierC: TestIdentity = { id: 'x509::CN=verifier-c::CN=ca.org2', mspId: 'Org2MSP' };
export const outsider: TestIdentity = { id: 'x509::CN=outsider::CN=ca.org2', mspId: 'Org2MSP' };
export const TREASURY = 'x509::CN=treasury::CN=ca.org1';

export interface EscrowParams {
    taskId?: string;
    payee?: string;
    verifiers?: readonly string[];
    approvalsRequired?: number;
    marketplaceFeeRate?: number;
    verifierFeeRate?: number;
    amount?: bigint;
}

export class Harness {
    readonly world = new WorldState();
    readonly escrow: EscrowContract;
    readonly token = new TokenContract();

    constructor(transfer?: ValueTransfer) {
        this.escrow = new EscrowContract('EscrowContract', transfer);
    }

    static async initialized(transfer?: ValueTransfer, mintToDepositor = 100n * E18): Promise<Harness> {
        const harness = new Harness(transfer);
        await harness.world.submit(harness.escrow, admin, (ctx) => harness.escrow.Initialize(ctx, TREASURY));
        await harness.world.submit(harness.token, admin, (ctx) => harness.token.Mint(ctx, depositor.id, mintToDepositor.toString()));
        return harness;
    }

    async create(params: EscrowParams = {}, caller: TestIdentity = depositor): Promise<void> {
        const verifiers = params.verifiers ?? [verifierA.id, verifierB.id];
        await this.world.submit(this.escrow, caller, (ctx) =>
            this.escrow.CreateEscrow(
                ctx,
                params.taskId ?? 'task-1',
                params.payee ?? payee.id,
                JSON.stringify(verifiers),
                String(params.approvalsRequired ?? verifiers.length),
                String(params.marketplaceFeeRate ?? 500),
                String(params.verifierFeeRate ?? 200),
                (params.amount ?? 10n * E18).toString()
            )
        );
    }

    async approveRelease(caller: TestIdentity, taskId = 'task-1'): Promise<void> {
        await this.world.submit(this.escrow, caller, (ctx) => this.escrow.ApproveRelease(ctx, taskId));
    }

    async approveRefund(caller: TestIdentity, taskId = 'task-1'): Promise<void> {
        await this.world.submit(this.escrow, caller, (ctx) => this.escrow.ApproveRefund(ctx, taskId));
    }

    async record(taskId = 'task-1'): Promise<EscrowRecord> {
        const json = await this.world.evaluate(this.escrow, outsider, (ctx) => this.escrow.GetEscrow(ctx, taskId));
        return EscrowRecordSchema.parse(JSON.parse(json));
    }

    async verifiers(taskId = 'task-1'): Promise<string[]> {
        const json = await this.world.evaluate(this.escrow, outsider, (ctx) => this.escrow.GetVerifiers(ctx, taskId));
        const parsed: unknown = JSON.parse(json);
        return Array.isArray(parsed) ? parsed.map(String) : [];
    }

    async balance(account: string): Promise<bigint> {
        return BigInt(await this.world.evaluate(this.token, outsider, (ctx) => this.token.BalanceOf(ctx, account)));
    }

    async custody(): Promise<bigint> {
        return BigInt(await this.world.evaluate(this.token, outsider, (ctx) => this.token.CustodyBalance(ctx)));
    }

    lastEvent() {
        return this.world.events[this.world.events.length - 1];
    }
}
