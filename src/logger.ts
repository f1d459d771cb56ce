/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Shim } from 'fabric-shim';

export type Logger = ReturnType<typeof Shim.newLogger>;

// Level follows CORE_CHAINCODE_LOGGING_LEVEL, which the peer sets for the chaincode process.
export function getLogger(name: string): Logger {
    return Shim.newLogger(name);
}
