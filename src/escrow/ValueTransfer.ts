/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LedgerContext } from '../context';
import { transferFailed } from '../errors';

/**
 * Pushes value out of escrow custody to a recipient. Implementations may
 * call back into the chaincode; the payout guard on the context rejects that.
 */
export interface ValueTransfer {
    pay(ctx: LedgerContext, recipient: string, amount: bigint): Promise<void>;
}

export class LedgerTransfer implements ValueTransfer {
    async pay(ctx: LedgerContext, recipient: string, amount: bigint): Promise<void> {
        if (!(await ctx.tokens.acceptsDeposits(recipient))) {
            throw transferFailed(recipient);
        }
        await ctx.tokens.release(recipient, amount);
    }
}
