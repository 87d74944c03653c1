import { CheckConnectOptions } from '../utils';

import type { ResolvedConnectOptions } from '../client/connect-options';

const enum BusEnv {
    SessionBusAddress = 'STRBUS_SESSION_BUS_ADDRESS',
    SystemBusAddress = 'STRBUS_SYSTEM_BUS_ADDRESS',
}

export interface BusEnvironment {
    session?: ResolvedConnectOptions;
    system?: ResolvedConnectOptions;
}

function readAddress(env: NodeJS.ProcessEnv, name: string): ResolvedConnectOptions | undefined {
    const value = env[name]?.trim();
    if (!value) {
        return undefined;
    }
    return CheckConnectOptions(value);
}

/**
 * Reads the addresses of the session and system buses. Throws on a malformed address.
 */
export function readBusEnvironment(env: NodeJS.ProcessEnv = process.env): BusEnvironment {
    return {
        session: readAddress(env, BusEnv.SessionBusAddress),
        system: readAddress(env, BusEnv.SystemBusAddress),
    };
}
