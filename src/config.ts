/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { EscrowError } from './errors';
import { fromBytes, toBytes } from './serialization';
import type { Stub } from './context';

export const FEE_DENOMINATOR = 10_000n;
export const MAX_FEE_RATE = 10_000;
// Largest verifier set an 8-bit approval counter can track.
export const MAX_VERIFIERS = 255;

const CONFIG_KEY = 'ESCROW_CONFIG';

export const ChaincodeConfigSchema = z.object({
    treasury: z.string().min(1),
    minterMspId: z.string().min(1),
    initializedBy: z.string(),
});

export type ChaincodeConfig = z.infer<typeof ChaincodeConfigSchema>;

export async function readConfig(stub: Stub): Promise<ChaincodeConfig | undefined> {
    return fromBytes(await stub.getState(CONFIG_KEY), ChaincodeConfigSchema);
}

export async function requireConfig(stub: Stub): Promise<ChaincodeConfig> {
    const config = await readConfig(stub);
    if (!config) throw new EscrowError('NotInitialized', 'chaincode has not been initialized');
    return config;
}

export async function writeConfig(stub: Stub, config: ChaincodeConfig): Promise<void> {
    await stub.putState(CONFIG_KEY, toBytes(config));
}
