import { BusConnectorImpl } from './bus-connector-impl';

import type { BusBroker } from '../broker/broker';
import type { BrokerClient } from '../broker/broker-client';
import type { BusCommand } from '../contract/bus-command';
import type { Logger } from '../log/logger';
import type { UuidProvider } from '../utils/uuid';

/**
 * Connector talking to a broker of the same process by direct calls.
 * It is its own broker client.
 */
export class LocalConnector extends BusConnectorImpl implements BrokerClient {
    private _onDataHandler?: (client: BrokerClient, command: BusCommand) => void;
    private _onCloseHandler?: (client: BrokerClient) => void;

    constructor(
        private readonly _broker: BusBroker,
        uuid: UuidProvider,
        name: string,
        logger?: Logger
    ) {
        super(uuid, name, logger);
    }

    protected override handshakeInternal(): Promise<void> {
        this._broker.addClient(this);
        return Promise.resolve();
    }

    protected override shutdownInternal(): Promise<void> {
        const onClose = this._onCloseHandler;
        this._onDataHandler = undefined;
        this._onCloseHandler = undefined;
        onClose?.(this);
        return Promise.resolve();
    }

    public postCommand(command: BusCommand): void {
        if (!this._onDataHandler) {
            this._logger?.warn(`[LocalConnector] Dropping ${command.kind}: not attached to a broker`);
            return;
        }
        this._onDataHandler(this, command);
    }

    // BrokerClient
    public send(command: BusCommand): void {
        this._client?.onConnectorCommand(command);
    }

    public subscribe(
        onData: (client: BrokerClient, command: BusCommand) => void,
        _onError: (client: BrokerClient, error: Error) => void,
        onClose: (client: BrokerClient) => void
    ): void {
        this._onDataHandler = onData;
        this._onCloseHandler = onClose;
    }

    /**
     * Called by the broker when it drops this client; a release that does not come from `shutdown`
     * means the link is lost.
     */
    public release(): void {
        const attached = this._onDataHandler !== undefined;
        this._onDataHandler = undefined;
        this._onCloseHandler = undefined;
        if (attached) {
            this.onConnectorShutdown();
        }
    }

    [Symbol.toPrimitive](): string {
        return `LocalConnector: ${this.peer.name}-${this.peer.id}`;
    }
}
