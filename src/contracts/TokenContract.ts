/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Info, Returns, Transaction } from 'fabric-contract-api';
import { requireConfig } from '../config';
import { LedgerContext } from '../context';
import { EscrowError, transferFailed } from '../errors';
import { getLogger } from '../logger';
import { parseAmount, requirePrincipal } from '../validation';
import { BaseContract } from './BaseContract';

const logger = getLogger('TokenContract');

@Info({ title: 'TokenContract', description: 'Balances that escrows lock and pay out' })
export class TokenContract extends BaseContract {
    constructor() {
        super('TokenContract');
    }

    @Transaction()
    async Mint(ctx: LedgerContext, account: string, amount: string): Promise<void> {
        const config = await requireConfig(ctx.stub);
        const client = this.getClient(ctx);
        if (client.mspId !== config.minterMspId) {
            throw new EscrowError('Unauthorized', `MSP ${client.mspId} may not mint`, { subject: client.id });
        }

        requirePrincipal(account, 'account');
        const value = parseAmount(amount);
        await ctx.tokens.mint(account, value);

        ctx.emit({ name: 'Minted', payload: { account, amount: value.toString() } });
        logger.info(`Minted ${value} to ${account}`);
    }

    @Transaction()
    async Transfer(ctx: LedgerContext, to: string, amount: string): Promise<void> {
        const from = this.getClient(ctx).id;
        requirePrincipal(to, 'recipient');
        const value = parseAmount(amount);
        if (!(await ctx.tokens.acceptsDeposits(to))) throw transferFailed(to);

        await ctx.tokens.transfer(from, to, value);
        ctx.emit({ name: 'Transferred', payload: { from, to, amount: value.toString() } });
    }

    @Transaction()
    async SetDepositPolicy(ctx: LedgerContext, accepts: string): Promise<void> {
        if (accepts !== 'true' && accepts !== 'false') {
            throw new EscrowError('InvalidArgument', `accepts must be "true" or "false", got "${accepts}"`);
        }
        const account = this.getClient(ctx).id;
        await ctx.tokens.setDepositPolicy(account, accepts === 'true');
        logger.info(`${account} ${accepts === 'true' ? 'accepts' : 'refuses'} deposits`);
    }

    @Transaction(false)
    @Returns('string')
    async BalanceOf(ctx: LedgerContext, account: string): Promise<string> {
        return (await ctx.tokens.balanceOf(account)).toString();
    }

    @Transaction(false)
    @Returns('string')
    async ClientAccountID(ctx: LedgerContext): Promise<string> {
        return this.getClient(ctx).id;
    }

    @Transaction(false)
    @Returns('string')
    async ClientAccountBalance(ctx: LedgerContext): Promise<string> {
        return (await ctx.tokens.balanceOf(this.getClient(ctx).id)).toString();
    }

    @Transaction(false)
    @Returns('string')
    async CustodyBalance(ctx: LedgerContext): Promise<string> {
        return (await ctx.tokens.custodyBalance()).toString();
    }

    @Transaction(false)
    @Returns('string')
    async TotalSupply(ctx: LedgerContext): Promise<string> {
        return (await ctx.tokens.totalSupply()).toString();
    }
}
