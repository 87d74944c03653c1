import { executeInTimeout } from '@strbus/universal';
import { WebSocketServer } from 'ws';

import { WsBrokerServer } from './ws-broker-server';

import type { WsServerFactory } from '../utils/ws-socket';
import type { BrokerServer, BrokerServerFactory, JsonLike, Logger, ResolvedConnectOptions } from '@strbus/universal';

const defaultServerFactory: WsServerFactory = (host, port) =>
    new WebSocketServer({ host, port, clientTracking: false });

export class WsBrokerServerFactory implements BrokerServerFactory {
    constructor(
        private readonly _json: JsonLike,
        private readonly _logger?: Logger,
        private readonly _createServer: WsServerFactory = defaultServerFactory
    ) {}

    public async create(options: ResolvedConnectOptions): Promise<BrokerServer> {
        const host = options.host || '127.0.0.1';
        const port = options.port;
        if (!port) {
            throw new Error(`You must specify 'port' parameter to start Broker`);
        }

        const server = this._createServer(host, port);
        return executeInTimeout<BrokerServer>(
            options.timeoutDelay,
            (resolve, reject) => {
                server.on('error', (error) => {
                    server.removeAllListeners();
                    reject(new Error(`[WsBrokerFactory] error = ${error} on ${host}:${port}`));
                });

                server.on('close', () => {
                    server.removeAllListeners();
                    reject(new Error(`[WsBrokerFactory] close on ${host}:${port}`));
                });

                server.on('listening', () => {
                    server.removeAllListeners();
                    this._logger?.info(`[WsBrokerFactory] Listening on ${host}:${port}`);
                    resolve(new WsBrokerServer(server, this._json, this._logger));
                });
            },
            (reject) => {
                server.removeAllListeners();
                server.close();
                reject(new Error(`[WsBrokerFactory] Timeout (${options.timeoutDelay} ms) on ${host}:${port}`));
            }
        );
    }
}
