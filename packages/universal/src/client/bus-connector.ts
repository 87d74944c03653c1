import type { BusAddressLike, CloseOptions } from './connect-options';
import type { BusCommand } from '../contract/bus-command';
import type { BusPeer } from '../contract/bus-peer';

export interface BusConnectorClient {
    onConnectorCommand(command: BusCommand): void;
    onConnectorShutdown(): void;
}

/**
 * Link between one bus connection and the broker.
 */
export interface BusConnector {
    readonly peer: BusPeer;
    readonly isConnected: boolean;

    handshake(client: BusConnectorClient, address?: BusAddressLike): Promise<BusPeer>;
    shutdown(options?: CloseOptions): Promise<void>;

    postCommand(command: BusCommand): void;
}
