import type { BusCommand } from '../contract/bus-command';

/**
 * Broker side of one link to a peer: a WebSocket, or an in-process connector.
 */
export interface BrokerClient {
    send(command: BusCommand): void;
    /**
     * Subscribes to the link events using callbacks
     * @param onData The callback triggered when a command arrives from the peer
     * @param onError The callback triggered when the link reported an error
     * @param onClose The callback triggered when the link is closed
     */
    subscribe(
        onData: (client: BrokerClient, command: BusCommand) => void,
        onError: (client: BrokerClient, error: Error) => void,
        onClose: (client: BrokerClient) => void
    ): void;
    release(): void;
    /**
     * Can be implemented to address correct logging messages
     */
    [Symbol.toPrimitive]?(): string;
}
