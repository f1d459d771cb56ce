/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Context } from 'fabric-contract-api';
import { EscrowLedger } from './ledger/EscrowLedger';
import { TokenLedger } from './ledger/TokenLedger';
import type { LedgerEvent } from './models/Events';

export type Stub = Context['stub'];

/**
 * Per-transaction context. Fabric builds a fresh one for every invocation,
 * so everything held here lives exactly as long as one transaction.
 */
export class LedgerContext extends Context {
    readonly events: LedgerEvent[] = [];

    // Set while payouts are being pushed; entry points refuse to run under it.
    payoutInFlight = false;

    private escrowLedger?: EscrowLedger;
    private tokenLedger?: TokenLedger;

    get escrows(): EscrowLedger {
        if (!this.escrowLedger) this.escrowLedger = new EscrowLedger(this.stub);
        return this.escrowLedger;
    }

    // Cached so repeated credits to one account within a transaction accumulate.
    get tokens(): TokenLedger {
        if (!this.tokenLedger) this.tokenLedger = new TokenLedger(this.stub);
        return this.tokenLedger;
    }

    emit(event: LedgerEvent): void {
        this.events.push(event);
    }
}
