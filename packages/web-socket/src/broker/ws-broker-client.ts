import { decodeCommand, encodeCommand } from '../utils/command-frame';

import type { WsSocket } from '../utils/ws-socket';
import type { BrokerClient, BusCommand, JsonLike, Logger } from '@strbus/universal';
import type { RawData } from 'ws';

/**
 * Broker side of one peer's socket.
 */
export class WsBrokerClient implements BrokerClient {
    private _onSocketDataHandler?: (client: BrokerClient, command: BusCommand) => void;
    private _onSocketErrorHandler?: (client: BrokerClient, error: Error) => void;
    private _onSocketCloseHandler?: (client: BrokerClient) => void;
    private _released = false;

    constructor(
        private readonly _socket: WsSocket,
        private readonly _json: JsonLike,
        private readonly _logger?: Logger
    ) {
        this._logger?.info(`[WsBrokerClient] Connect: ${this._socket.url}`);

        this._onSocketData = this._onSocketData.bind(this);
        this._onSocketError = this._onSocketError.bind(this);
        this._onSocketClose = this._onSocketClose.bind(this);
    }

    public subscribe(
        onSocketData: (client: BrokerClient, command: BusCommand) => void,
        onSocketError: (client: BrokerClient, error: Error) => void,
        onSocketClose: (client: BrokerClient) => void
    ): void {
        this._onSocketDataHandler = onSocketData;
        this._onSocketErrorHandler = onSocketError;
        this._onSocketCloseHandler = onSocketClose;

        this._socket.on('message', this._onSocketData);
        this._socket.on('close', this._onSocketClose);
        this._socket.on('error', this._onSocketError);
    }

    public release(): void {
        if (this._released) {
            return;
        }
        this._released = true;
        this._logger?.info(`[WsBrokerClient] Release: ${this._socket.url}`);
        this._socket.off('message', this._onSocketData);
        this._socket.off('close', this._onSocketClose);
        this._socket.off('error', this._onSocketError);

        this._socket.close();
        this._onSocketCloseHandler = undefined;
        this._onSocketErrorHandler = undefined;
        this._onSocketDataHandler = undefined;
    }

    public send(command: BusCommand): void {
        if (this._released) {
            return;
        }
        this._socket.send(encodeCommand(this._json, command));
    }

    [Symbol.toPrimitive](): string {
        return `WsBrokerClient: ${this._socket.url}`;
    }

    private _onSocketData(rawData: RawData): void {
        let command: BusCommand;
        try {
            command = decodeCommand(this._json, rawData);
        } catch (error) {
            this._logger?.warn(`[WsBrokerClient] Dropping frame from ${this._socket.url}: ${error}`);
            return;
        }
        this._onSocketDataHandler?.(this, command);
    }

    private _onSocketError(err: Error): void {
        this._logger?.info(`[WsBrokerClient] Error on connection: ${this._socket.url} - ${err}`);
        this._onSocketErrorHandler?.(this, err);
    }

    private _onSocketClose(): void {
        this._logger?.info(`[WsBrokerClient] Close on connection: ${this._socket.url}`);
        this._onSocketCloseHandler?.(this);
        this.release();
    }
}
