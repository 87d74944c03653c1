import { executeInTimeout } from '@strbus/universal';

import { WsBrokerClient } from './ws-broker-client';

import type { WsServerLike, WsSocket } from '../utils/ws-socket';
import type { BrokerClient, BrokerCloseOptions, BrokerServer, JsonLike, Logger } from '@strbus/universal';

export class WsBrokerServer implements BrokerServer {
    private _onCloseHandler?: () => void;
    private _onErrorHandler?: (error: Error) => void;
    private _onConnectionHandler?: (client: BrokerClient) => void;

    constructor(
        private readonly _server: WsServerLike,
        private readonly _json: JsonLike,
        private readonly _logger?: Logger
    ) {
        this._onClose = this._onClose.bind(this);
        this._onError = this._onError.bind(this);
        this._onConnection = this._onConnection.bind(this);
    }

    public subscribe(
        onClose: () => void,
        onError: (error: Error) => void,
        onConnection: (client: BrokerClient) => void
    ): void {
        this._onCloseHandler = onClose;
        this._onErrorHandler = onError;
        this._onConnectionHandler = onConnection;

        this._server.on('close', this._onClose);
        this._server.on('error', this._onError);
        this._server.on('connection', this._onConnection);
    }

    public unsubscribe(): void {
        this._onCloseHandler = undefined;
        this._onErrorHandler = undefined;
        this._onConnectionHandler = undefined;

        this._server.off('close', this._onClose);
        this._server.off('error', this._onError);
        this._server.off('connection', this._onConnection);
    }

    public close(options?: BrokerCloseOptions): Promise<void> {
        const timeoutDelay = options?.timeoutDelay ?? -1;
        return executeInTimeout<void>(
            timeoutDelay,
            (resolve, reject) => {
                this.unsubscribe();
                this._server.close((error?: Error) => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    resolve();
                });
            },
            (reject) => {
                reject(new Error(`[WsBrokerServer] stop, error = timeout (${timeoutDelay} ms)`));
            }
        );
    }

    private _onConnection(socket: WsSocket): void {
        this._onConnectionHandler?.(new WsBrokerClient(socket, this._json, this._logger));
    }

    private _onClose(): void {
        this._onCloseHandler?.();
    }

    private _onError(error: Error): void {
        this._onErrorHandler?.(error);
    }
}
