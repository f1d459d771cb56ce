/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Stub } from '../context';
import { EscrowError } from '../errors';
import { isEmpty } from '../serialization';

const BALANCE = 'balance';
const CUSTODY = 'custody';
const SUPPLY = 'supply';
const DEPOSIT_POLICY = 'account~policy';

const REJECT = Uint8Array.of(0);

/**
 * Fungible balances plus the custody pot holding every locked escrow deposit.
 *
 * Values are cached per transaction and written through on every change, so
 * two credits to the same account in one transaction both land.
 */
export class TokenLedger {
    private readonly cache = new Map<string, bigint>();

    constructor(private readonly stub: Stub) {}

    async balanceOf(account: string): Promise<bigint> {
        return this.read(this.balanceKey(account));
    }

    async custodyBalance(): Promise<bigint> {
        return this.read(this.custodyKey());
    }

    async totalSupply(): Promise<bigint> {
        return this.read(this.supplyKey());
    }

    async mint(account: string, amount: bigint): Promise<void> {
        await this.add(this.balanceKey(account), amount);
        await this.add(this.supplyKey(), amount);
    }

    async transfer(from: string, to: string, amount: bigint): Promise<void> {
        await this.debit(from, amount);
        await this.add(this.balanceKey(to), amount);
    }

    // Moves a deposit from the depositor into custody.
    async lock(from: string, amount: bigint): Promise<void> {
        await this.debit(from, amount);
        await this.add(this.custodyKey(), amount);
    }

    // Pays out of custody.
    async release(to: string, amount: bigint): Promise<void> {
        const key = this.custodyKey();
        const held = await this.read(key);
        if (held < amount) {
            throw new EscrowError('InsufficientBalance', `custody holds ${held}, payout needs ${amount}`);
        }
        await this.write(key, held - amount);
        await this.add(this.balanceKey(to), amount);
    }

    async acceptsDeposits(account: string): Promise<boolean> {
        const policy = await this.stub.getState(this.policyKey(account));
        return isEmpty(policy) || policy[0] !== REJECT[0];
    }

    async setDepositPolicy(account: string, accepts: boolean): Promise<void> {
        const key = this.policyKey(account);
        if (accepts) {
            await this.stub.deleteState(key);
        } else {
            await this.stub.putState(key, REJECT);
        }
    }

    private async debit(account: string, amount: bigint): Promise<void> {
        const key = this.balanceKey(account);
        const balance = await this.read(key);
        if (balance < amount) {
            throw new EscrowError('InsufficientBalance', `${account} holds ${balance}, needs ${amount}`, { subject: account });
        }
        await this.write(key, balance - amount);
    }

    private async add(key: string, amount: bigint): Promise<void> {
        await this.write(key, (await this.read(key)) + amount);
    }

    private async read(key: string): Promise<bigint> {
        const cached = this.cache.get(key);
        if (cached !== undefined) return cached;

        const data = await this.stub.getState(key);
        const value = isEmpty(data) ? 0n : BigInt(Buffer.from(data).toString('utf8'));
        this.cache.set(key, value);
        return value;
    }

    private async write(key: string, value: bigint): Promise<void> {
        this.cache.set(key, value);
        await this.stub.putState(key, Buffer.from(value.toString()));
    }

    private balanceKey(account: string): string {
        return this.stub.createCompositeKey(BALANCE, [account]);
    }

    private custodyKey(): string {
        return this.stub.createCompositeKey(CUSTODY, []);
    }

    private supplyKey(): string {
        return this.stub.createCompositeKey(SUPPLY, []);
    }

    private policyKey(account: string): string {
        return this.stub.createCompositeKey(DEPOSIT_POLICY, [account]);
    }
}
