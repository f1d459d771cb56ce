/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import {type Contract} from 'fabric-contract-api';
import { EscrowContract } from './contracts/EscrowContract';
import { TokenContract } from './contracts/TokenContract';

export { EscrowContract } from './contracts/EscrowContract';
export { TokenContract } from './contracts/TokenContract';
export { EscrowError } from './errors';
export type { EscrowErrorCode, ErrorCategory } from './errors';
export { LedgerTransfer } from './escrow/ValueTransfer';
export type { ValueTransfer } from './escrow/ValueTransfer';
export { computeReleaseSplit, computeRefundSplit, splitVerifierFee } from './escrow/FeeDistributor';
export { EscrowStatus } from './models/Escrow';
export type { ApprovalPath, EscrowRecord } from './models/Escrow';

export const contracts: typeof Contract[] = [
    EscrowContract,
    TokenContract,
];
