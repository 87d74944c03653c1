import { BusCommandKind } from '../contract/bus-command';
import { CheckConnectOptions, CheckTimeoutOptions } from '../utils';
import { ConnectionState } from '../utils/connection-state';
import { executeInTimeout } from '../utils/execute-in-timeout';

import type { BusConnector, BusConnectorClient } from './bus-connector';
import type { BusAddressLike, CloseOptions, ResolvedConnectOptions } from './connect-options';
import type { BusCommand } from '../contract/bus-command';
import type { BusPeer } from '../contract/bus-peer';
import type { Logger } from '../log/logger';
import type { UuidProvider } from '../utils/uuid';

export abstract class BusConnectorImpl implements BusConnector {
    public readonly peer: BusPeer;
    protected _client?: BusConnectorClient;
    private readonly _connectCloseState = new ConnectionState<BusPeer>();

    constructor(
        uuid: UuidProvider,
        name: string,
        protected readonly _logger?: Logger
    ) {
        this.peer = { id: uuid(), name };
    }

    public get isConnected(): boolean {
        return this._connectCloseState.connected;
    }

    public handshake(client: BusConnectorClient, address?: BusAddressLike): Promise<BusPeer> {
        return this._connectCloseState.connect(async () => {
            const options = CheckConnectOptions(address);
            await executeInTimeout<void>(
                options.timeoutDelay,
                (resolve, reject) => {
                    this.handshakeInternal(client, options).then(resolve, (error: unknown) => {
                        this._logger?.error(`[BusConnector] Failed to connect. ${error}`);
                        reject(error);
                    });
                },
                (reject) => {
                    const message = `[BusConnector] Failed to connect after ${options.timeoutDelay}ms.`;
                    this._logger?.error(message);
                    this.shutdownInternal().catch((error: unknown) => {
                        this._logger?.error(`[BusConnector] Failed to release after timeout. ${error}`);
                    });
                    reject(new Error(message));
                }
            );
            this._client = client;
            this.postCommand({ kind: BusCommandKind.Handshake, peer: this.peer });
            return this.peer;
        });
    }

    public shutdown(options?: CloseOptions): Promise<void> {
        return this._connectCloseState.close(() => {
            const resolved = CheckTimeoutOptions(options);
            return executeInTimeout<void>(
                resolved.timeoutDelay,
                (resolve, reject) => {
                    this.postCommand({ kind: BusCommandKind.Shutdown, peer: this.peer });
                    this.shutdownInternal().then(
                        () => {
                            this.onConnectorShutdown();
                            resolve();
                        },
                        (error: unknown) => {
                            this._logger?.error(`[BusConnector] Failed to shutdown. ${error}`);
                            this.onConnectorShutdown();
                            reject(error);
                        }
                    );
                },
                (reject) => {
                    const message = `[BusConnector] Failed shutdown after ${resolved.timeoutDelay}ms.`;
                    this._logger?.error(message);
                    this.onConnectorShutdown();
                    reject(new Error(message));
                }
            );
        });
    }

    /**
     * Called once the link is gone, whether closed by `shutdown` or lost.
     */
    protected onConnectorShutdown(): void {
        const client = this._client;
        this._client = undefined;
        this._connectCloseState.shutdown();
        client?.onConnectorShutdown();
    }

    protected abstract handshakeInternal(client: BusConnectorClient, options: ResolvedConnectOptions): Promise<void>;
    protected abstract shutdownInternal(): Promise<void>;
    abstract postCommand(command: BusCommand): void;
}
