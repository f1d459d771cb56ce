/*
 * SPDX-License-Identifier: Apache-2.0
 */

import stringify from 'json-stringify-deterministic';
import { z } from 'zod';

// Endorsing peers must produce byte-identical write sets, so keys are sorted on write.
export function toBytes(value: object): Uint8Array {
    return Buffer.from(stringify(value));
}

export function isEmpty(data: Uint8Array | undefined): boolean {
    return !data || data.length === 0;
}

export function fromBytes<S extends z.ZodTypeAny>(data: Uint8Array, schema: S): z.infer<S> | undefined {
    if (isEmpty(data)) return undefined;
    return schema.parse(JSON.parse(Buffer.from(data).toString('utf8')));
}

export function toJson(value: object): string {
    return stringify(value);
}
