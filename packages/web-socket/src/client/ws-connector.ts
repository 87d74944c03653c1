import { BusConnectorImpl } from '@strbus/universal';
import { WebSocket } from 'ws';

import { decodeCommand, encodeCommand } from '../utils/command-frame';

import type { WsSocket, WsSocketFactory } from '../utils/ws-socket';
import type {
    BusCommand,
    BusConnectorClient,
    JsonLike,
    Logger,
    ResolvedConnectOptions,
    UuidProvider,
} from '@strbus/universal';
import type { RawData } from 'ws';

const defaultSocketFactory: WsSocketFactory = (url) => new WebSocket(url);

/**
 * Connector reaching a broker over one WebSocket.
 */
export class WsConnector extends BusConnectorImpl {
    private _socket?: WsSocket;

    constructor(
        uuid: UuidProvider,
        name: string,
        private readonly _json: JsonLike,
        logger?: Logger,
        private readonly _createSocket: WsSocketFactory = defaultSocketFactory
    ) {
        super(uuid, name, logger);

        this._onSocketData = this._onSocketData.bind(this);
        this._onSocketError = this._onSocketError.bind(this);
        this._onSocketClose = this._onSocketClose.bind(this);
    }

    protected override handshakeInternal(
        _client: BusConnectorClient,
        options: ResolvedConnectOptions
    ): Promise<void> {
        if (!options.port) {
            return Promise.reject(new Error(`Connection options must include 'port'`));
        }
        const host = options.host || '127.0.0.1';
        const socket = this._createSocket(`ws://${host}:${options.port}`);
        this._socket = socket;

        return new Promise<void>((resolve, reject) => {
            const removeTempListeners = () => {
                socket.off('error', onSocketError);
                socket.off('close', onSocketClose);
                socket.off('open', onSocketOpen);
            };

            const fallbackReject = (message: string) => {
                removeTempListeners();
                this._detachSocket();
                this._logger?.error(message);
                reject(new Error(message));
            };

            const onSocketError = (error: Error) => {
                fallbackReject(`[WsConnector] Socket error on handshake: ${error}`);
            };

            const onSocketClose = () => {
                fallbackReject(`[WsConnector] Socket was closed on handshake`);
            };

            const onSocketOpen = () => {
                removeTempListeners();
                socket.on('error', this._onSocketError);
                socket.on('close', this._onSocketClose);
                socket.on('message', this._onSocketData);
                resolve();
            };

            socket.on('error', onSocketError);
            socket.on('close', onSocketClose);
            socket.on('open', onSocketOpen);
        });
    }

    protected override shutdownInternal(): Promise<void> {
        const socket = this._socket;
        if (!socket) {
            return Promise.resolve();
        }

        this._detachSocket();
        return new Promise<void>((resolve) => {
            const closeHandler = () => {
                socket.off('close', closeHandler);
                resolve();
            };

            socket.on('close', closeHandler);
            socket.close();
        });
    }

    public postCommand(command: BusCommand): void {
        if (!this._socket) {
            this._logger?.warn(`[WsConnector ${this.peer.id}] Dropping ${command.kind}: socket is closed`);
            return;
        }
        this._socket.send(encodeCommand(this._json, command));
    }

    private _onSocketData(rawData: RawData): void {
        let command: BusCommand;
        try {
            command = decodeCommand(this._json, rawData);
        } catch (error) {
            this._logger?.warn(`[WsConnector ${this.peer.id}] Dropping frame: ${error}`);
            return;
        }
        this._client?.onConnectorCommand(command);
    }

    private _onSocketClose(): void {
        this._logger?.info(`[WsConnector ${this.peer.id}] socket close`);
        this._detachSocket();
        this.onConnectorShutdown();
    }

    private _onSocketError(error: Error): void {
        this._logger?.error(`[WsConnector ${this.peer.id}] socket error ${error}`);
        const socket = this._socket;
        this._detachSocket();
        socket?.close();
        this.onConnectorShutdown();
    }

    private _detachSocket(): void {
        const socket = this._socket;
        if (!socket) {
            return;
        }
        socket.off('error', this._onSocketError);
        socket.off('close', this._onSocketClose);
        socket.off('message', this._onSocketData);
        this._socket = undefined;
    }
}
