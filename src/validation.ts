/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { MAX_FEE_RATE, MAX_VERIFIERS } from './config';
import { duplicateVerifier, EscrowError } from './errors';
import { VerifierListSchema } from './models/Escrow';

const DIGITS = /^\d+$/;

export function isBlank(principal: string | undefined): boolean {
    return !principal || principal.trim().length === 0;
}

export function requirePrincipal(principal: string, role: string): string {
    if (isBlank(principal)) throw new EscrowError('ZeroAddress', `${role} must be a non-empty principal`);
    return principal;
}

// Amounts are whole minor units; anything else, zero included, is rejected.
export function parseAmount(raw: string): bigint {
    const value = raw.trim();
    if (!DIGITS.test(value) || BigInt(value) === 0n) {
        throw new EscrowError('InvalidAmount', `amount must be a positive integer, got "${raw}"`);
    }
    return BigInt(value);
}

export function parseFeeRates(marketplace: string, verifier: string): { marketplaceFeeRate: number; verifierFeeRate: number } {
    const marketplaceFeeRate = parseRate(marketplace);
    const verifierFeeRate = parseRate(verifier);
    if (marketplaceFeeRate + verifierFeeRate > MAX_FEE_RATE) {
        throw new EscrowError('InvalidFeeConfiguration', `fees total ${marketplaceFeeRate + verifierFeeRate} bps, above ${MAX_FEE_RATE}`);
    }
    return { marketplaceFeeRate, verifierFeeRate };
}

function parseRate(raw: string): number {
    const value = raw.trim();
    if (!DIGITS.test(value) || Number(value) > MAX_FEE_RATE) {
        throw new EscrowError('InvalidFeeConfiguration', `fee rate must be 0..${MAX_FEE_RATE} bps, got "${raw}"`);
    }
    return Number(value);
}

/**
 * Parses the verifier list and quorum. Shape errors come first, then each
 * entry is checked in order so the first offending verifier is reported.
 */
export function parseVerifierSet(verifiersJson: string, approvalsRequired: string): { verifiers: string[]; approvalsRequired: number } {
    let decoded: unknown;
    try {
        decoded = JSON.parse(verifiersJson);
    } catch (err) {
        throw new EscrowError('InvalidVerifierConfiguration', 'verifiers must be a JSON array of principals', { cause: err });
    }

    const parsed = VerifierListSchema.safeParse(decoded);
    if (!parsed.success) {
        throw new EscrowError('InvalidVerifierConfiguration', 'verifiers must be a JSON array of principals', { cause: parsed.error });
    }
    const verifiers = parsed.data;

    const quorumText = approvalsRequired.trim();
    const quorum = DIGITS.test(quorumText) ? Number(quorumText) : 0;
    if (verifiers.length === 0 || verifiers.length > MAX_VERIFIERS) {
        throw new EscrowError('InvalidVerifierConfiguration', `verifier count must be 1..${MAX_VERIFIERS}, got ${verifiers.length}`);
    }
    if (quorum < 1 || quorum > verifiers.length) {
        throw new EscrowError('InvalidVerifierConfiguration', `approvals required must be 1..${verifiers.length}, got "${approvalsRequired}"`);
    }

    const seen = new Set<string>();
    for (const verifier of verifiers) {
        requirePrincipal(verifier, 'verifier');
        if (seen.has(verifier)) throw duplicateVerifier(verifier);
        seen.add(verifier);
    }

    return { verifiers, approvalsRequired: quorum };
}
