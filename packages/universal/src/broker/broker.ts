import type { BrokerClient } from './broker-client';
import type { BusAddressLike, CloseOptions, ConnectOptions } from '../client/connect-options';

export type BrokerConnectOptions = ConnectOptions;
export type BrokerCloseOptions = CloseOptions;

export interface BusBroker {
    /** Starts listening through the broker's server factory. */
    connect(address?: BusAddressLike, hostname?: string): Promise<void>;
    close(options?: BrokerCloseOptions): Promise<void>;
    /** Attaches a client living in the same process. */
    addClient(client: BrokerClient): void;
}
