import { LedgerTransfer } from '../src/escrow/ValueTransfer';
import { computeRefundSplit, computeReleaseSplit, FeeDistributor, feeOf, splitVerifierFee } from '../src/escrow/FeeDistributor';
import { EscrowStatus } from '../src/models/Escrow';
import { E18, Harness, TREASURY, payee, verifierA, verifierB, outsider } from './support/fixtures';

describe('fee math', () => {
    it('truncates basis-point fees', () => {
        expect(feeOf(10n, 500)).toBe(0n);
        expect(feeOf(1001n, 300)).toBe(30n);
        expect(feeOf(10n * E18, 500)).toBe(5n * 10n ** 17n);
    });

    it('splits a release so the payee absorbs rounding', () => {
        expect(computeReleaseSplit(10n * E18, 500, 200)).toEqual({
            payeeAmount: 93n * 10n ** 17n,
            marketplaceFee: 5n * 10n ** 17n,
            verifierFeeTotal: 2n * 10n ** 17n,
        });
        expect(computeReleaseSplit(1001n, 300, 1000)).toEqual({
            payeeAmount: 871n,
            marketplaceFee: 30n,
            verifierFeeTotal: 100n,
        });
    });

    it('takes no marketplace fee on refund', () => {
        expect(computeRefundSplit(5n * E18, 200)).toEqual({
            refundAmount: 49n * 10n ** 17n,
            verifierFeeTotal: 10n ** 17n,
        });
    });

    it('never creates or destroys value', () => {
        const cases: Array<[bigint, number, number]> = [
            [1n, 9999, 1],
            [7n, 3333, 3333],
            [999_999_999_999_999_999n, 250, 125],
            [12_345n, 0, 10_000],
            [12_345n, 10_000, 0],
        ];
        for (const [amount, marketplaceRate, verifierRate] of cases) {
            const release = computeReleaseSplit(amount, marketplaceRate, verifierRate);
            expect(release.payeeAmount + release.marketplaceFee + release.verifierFeeTotal).toBe(amount);
            expect(release.payeeAmount >= 0n).toBe(true);

            const refund = computeRefundSplit(amount, verifierRate);
            expect(refund.refundAmount + refund.verifierFeeTotal).toBe(amount);
        }
    });
});

describe('splitVerifierFee', () => {
    it('gives the remainder to the first approvers in list order', () => {
        expect(splitVerifierFee(100n, ['a', 'b', 'c'])).toEqual([
            { verifier: 'a', amount: 34n },
            { verifier: 'b', amount: 33n },
            { verifier: 'c', amount: 33n },
        ]);
        expect(splitVerifierFee(11n, ['a', 'b', 'c', 'd'])).toEqual([
            { verifier: 'a', amount: 3n },
            { verifier: 'b', amount: 3n },
            { verifier: 'c', amount: 3n },
            { verifier: 'd', amount: 2n },
        ]);
    });

    it('sums exactly to the total', () => {
        const approvers = ['a', 'b', 'c', 'd', 'e', 'f', 'g'];
        const shares = splitVerifierFee(1_000_003n, approvers);
        expect(shares.reduce((sum, share) => sum + share.amount, 0n)).toBe(1_000_003n);
        expect(shares.filter((share) => share.amount === 142_858n)).toHaveLength(Number(1_000_003n % 7n));
    });

    it('handles a fee smaller than the approver count', () => {
        expect(splitVerifierFee(1n, ['a', 'b'])).toEqual([
            { verifier: 'a', amount: 1n },
            { verifier: 'b', amount: 0n },
        ]);
    });

    it('returns nothing without approvers', () => {
        expect(splitVerifierFee(50n, [])).toEqual([]);
    });
});

describe('FeeDistributor.finalize', () => {
    it('routes the whole verifier fee to the treasury when nobody approved', async () => {
        const harness = await Harness.initialized();
        await harness.create();
        const distributor = new FeeDistributor(new LedgerTransfer());

        const settlement = await harness.world.submit(harness.escrow, outsider, async (ctx) => {
            const record = await ctx.escrows.getEscrow('task-1');
            if (!record) throw new Error('escrow missing');
            return distributor.finalize(ctx, record, 'release', outsider.id);
        });

        expect(settlement.payouts).toEqual([
            { recipient: payee.id, amount: 93n * 10n ** 17n },
            { recipient: TREASURY, amount: 5n * 10n ** 17n },
            { recipient: TREASURY, amount: 2n * 10n ** 17n },
        ]);
        expect(await harness.balance(TREASURY)).toBe(7n * 10n ** 17n);
        expect(await harness.balance(verifierA.id)).toBe(0n);
        expect(await harness.balance(verifierB.id)).toBe(0n);
        expect((await harness.record()).status).toBe(EscrowStatus.RELEASED);
        expect(harness.lastEvent()).toMatchObject({
            name: 'EscrowReleased',
            payload: { treasuryFallback: '200000000000000000', verifierPayouts: [], approvals: 0 },
        });
    });
});
