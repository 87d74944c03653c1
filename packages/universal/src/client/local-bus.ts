import { BusConnectionImpl } from './bus-connection-impl';
import { LocalConnector } from './local-connector';
import { BrokerImpl } from '../broker/broker-impl';
import { uuidProvider as defaultUuidProvider } from '../utils/uuid';

import type { BusLogConfig } from '../log/bus-log-config';
import type { Logger } from '../log/logger';
import type { UuidProvider } from '../utils/uuid';

export interface LocalBusContext {
    uuidProvider?: UuidProvider;
    logConfig?: BusLogConfig;
    logger?: Logger;
}

/**
 * A bus living inside the current process: one broker and any number of connections to it.
 */
export interface LocalBus {
    readonly broker: BrokerImpl;
    /** Creates a connection named `name` and completes its handshake with the broker. */
    connect(name: string): Promise<BusConnectionImpl>;
}

export function createLocalBus(ctx: LocalBusContext = {}): LocalBus {
    const uuid = ctx.uuidProvider ?? defaultUuidProvider;
    const broker = new BrokerImpl(undefined, ctx.logger);
    return {
        broker,
        async connect(name: string): Promise<BusConnectionImpl> {
            const connector = new LocalConnector(broker, uuid, name, ctx.logger);
            const connection = new BusConnectionImpl(connector, uuid, ctx.logConfig, ctx.logger);
            await connection.connect();
            return connection;
        },
    };
}
