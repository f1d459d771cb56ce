/*
 * SPDX-License-Identifier: Apache-2.0
 */

export type ErrorCategory = 'validation' | 'authorization' | 'state' | 'infrastructure';

const CATEGORIES = {
    ZeroAddress: 'validation',
    InvalidAmount: 'validation',
    InvalidFeeConfiguration: 'validation',
    InvalidVerifierConfiguration: 'validation',
    DuplicateVerifier: 'validation',
    Unauthorized: 'authorization',
    AlreadyApproved: 'authorization',
    EscrowAlreadyExists: 'state',
    InvalidEscrowState: 'state',
    AlreadyInitialized: 'state',
    NotInitialized: 'state',
    InsufficientBalance: 'state',
    InvalidArgument: 'validation',
    TransferFailed: 'infrastructure',
    ReentrancyGuardActive: 'infrastructure',
} satisfies Record<string, ErrorCategory>;

export type EscrowErrorCode = keyof typeof CATEGORIES;

export interface EscrowErrorOptions {
    // Principal the error is about (the duplicate verifier, the refusing recipient)
    subject?: string;
    cause?: unknown;
}

/**
 * Every failure raised by the chaincode. Fabric clients only receive the
 * message, so it always starts with the code.
 */
export class EscrowError extends Error {
    readonly category: ErrorCategory;
    readonly subject?: string;

    constructor(readonly code: EscrowErrorCode, message: string, options: EscrowErrorOptions = {}) {
        super(`${code}: ${message}`, { cause: options.cause });
        this.name = 'EscrowError';
        this.category = CATEGORIES[code];
        this.subject = options.subject;
    }
}

export function isEscrowError(err: unknown, code?: EscrowErrorCode): err is EscrowError {
    return err instanceof EscrowError && (code === undefined || err.code === code);
}

export function duplicateVerifier(who: string): EscrowError {
    return new EscrowError('DuplicateVerifier', `verifier ${who} is listed more than once`, { subject: who });
}

export function transferFailed(recipient: string, cause?: unknown): EscrowError {
    return new EscrowError('TransferFailed', `payout to ${recipient} was not accepted`, { subject: recipient, cause });
}
