/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Contract } from 'fabric-contract-api';
import { LedgerContext } from '../context';
import { EscrowError } from '../errors';
import { EVENT_BATCH } from '../models/Events';
import { toBytes } from '../serialization';

export class BaseContract extends Contract {
    constructor(name: string) {
        super(name);
    }

    createContext(): LedgerContext {
        return new LedgerContext();
    }

    // Fabric keeps a single event per transaction, so queued events go out together.
    async afterTransaction(ctx: LedgerContext, _result: unknown): Promise<void> {
        const [first, ...rest] = ctx.events;
        if (!first) return;
        if (rest.length === 0) {
            ctx.stub.setEvent(first.name, toBytes(first.payload));
            return;
        }
        ctx.stub.setEvent(EVENT_BATCH, toBytes({ events: ctx.events }));
    }

    // Helper: Get Client Identity
    protected getClient(ctx: LedgerContext) {
        const cid = ctx.clientIdentity;
        return {
            id: cid.getID(),
            mspId: cid.getMSPID(),
        };
    }

    // Helper: refuse entry while this transaction is pushing payouts
    protected assertNotReentered(ctx: LedgerContext): void {
        if (ctx.payoutInFlight) {
            throw new EscrowError('ReentrancyGuardActive', 'call rejected while a payout is in flight');
        }
    }
}
