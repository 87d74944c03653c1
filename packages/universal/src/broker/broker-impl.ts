import { BusCommandKind, BusErrorName } from '../contract/bus-command';
import { CheckConnectOptions, CheckTimeoutOptions } from '../utils';
import { ConnectionState } from '../utils/connection-state';

import type { BrokerCloseOptions, BusBroker } from './broker';
import type { BrokerClient } from './broker-client';
import type { BrokerServer } from './broker-server';
import type { BrokerServerFactory } from './broker-server-factory';
import type { BusAddressLike } from '../client/connect-options';
import type {
    BusCommand,
    ErrorCommand,
    MethodCallCommand,
    NameHasOwnerCommand,
    ReplyCommand,
    RequestNameCommand,
    SignalCommand,
} from '../contract/bus-command';
import type { BusPeer } from '../contract/bus-peer';
import type { Logger } from '../log/logger';

interface BusPeerEndpoint {
    peer: BusPeer;
    client: BrokerClient;
}

interface PendingCall {
    requestId: string;
    callerId: string;
    calleeId: string;
}

function pendingKey(callerId: string, requestId: string): string {
    return `${callerId}:${requestId}`;
}

/**
 * Routes commands between the peers of one bus and owns its name table.
 * Works without a server when every client is added through `addClient`.
 */
export class BrokerImpl implements BusBroker {
    private readonly _clients: BrokerClient[] = [];
    private readonly _endpoints = new Map<string, BusPeerEndpoint>();
    private readonly _owners = new Map<string, string>();
    private readonly _pendingCalls = new Map<string, PendingCall>();
    private readonly _connectCloseState = new ConnectionState();
    private _server?: BrokerServer;

    constructor(
        private readonly _serverFactory?: BrokerServerFactory,
        private readonly _logger?: Logger
    ) {
        this._onServerClose = this._onServerClose.bind(this);
        this._onServerError = this._onServerError.bind(this);
        this._onServerConnection = this._onServerConnection.bind(this);

        this._onClientData = this._onClientData.bind(this);
        this._onClientClose = this._onClientClose.bind(this);
        this._onClientError = this._onClientError.bind(this);
    }

    public connect(address?: BusAddressLike, hostname?: string): Promise<void> {
        return this._connectCloseState.connect(async () => {
            const serverFactory = this._serverFactory;
            if (!serverFactory) {
                throw new Error('[BrokerImpl] No server factory: this broker only accepts in-process clients');
            }
            const options = CheckConnectOptions(address, hostname);
            try {
                const server = await serverFactory.create(options);
                server.subscribe(this._onServerClose, this._onServerError, this._onServerConnection);
                this._server = server;
            } catch (error) {
                this._logger?.error(`[BrokerImpl] Failed to start: ${error}`);
                throw error;
            }
        });
    }

    public close(options?: BrokerCloseOptions): Promise<void> {
        return this._connectCloseState.close(async () => {
            const resolved = CheckTimeoutOptions(options);
            const server = this._server;
            this._reset();
            if (server) {
                this._server = undefined;
                await server.close(resolved);
            }
        });
    }

    public addClient(client: BrokerClient): void {
        this._logger?.info(`[BrokerImpl] Adding in-process client ${client}`);
        this._onServerConnection(client);
    }

    /** Peer id owning `serviceName`, if any. */
    public getOwner(serviceName: string): string | undefined {
        return this._owners.get(serviceName);
    }

    public get peerCount(): number {
        return this._endpoints.size;
    }

    protected _reset(): void {
        const clients = this._clients.splice(0, this._clients.length);
        clients.forEach((client) => {
            client.release();
        });
        this._endpoints.clear();
        this._owners.clear();
        this._pendingCalls.clear();
    }

    protected _onServerClose(): void {
        this._logger?.info(`[BrokerImpl] server close`);
        this._reset();
        this._server = undefined;
        this._connectCloseState.shutdown();
    }

    protected _onServerError(err: Error): void {
        this._logger?.error(`[BrokerImpl] server error ${err}`);
        this._reset();
    }

    protected _onServerConnection(client: BrokerClient): void {
        // Detailed representation is logged via [Symbol.toPrimitive]
        this._logger?.info(`[BrokerImpl] Incoming connection: ${client}`);
        client.subscribe(this._onClientData, this._onClientError, this._onClientClose);
        this._clients.push(client);
    }

    private _onClientError(client: BrokerClient, err: Error): void {
        this._logger?.error(`[BrokerImpl] Client ${client} error: ${err}`);
        this._onClientClose(client);
    }

    private _onClientClose(client: BrokerClient): void {
        const index = this._clients.indexOf(client);
        if (index < 0) {
            return;
        }
        this._clients.splice(index, 1);
        client.release();
        Array.from(this._endpoints.values())
            .filter((endpoint) => endpoint.client === client)
            .forEach((endpoint) => this._removeEndpoint(endpoint.peer.id));
        this._logger?.info(`[BrokerImpl] Connection closed: ${client}`);
    }

    private _onClientData(client: BrokerClient, command: BusCommand): void {
        switch (command.kind) {
            case BusCommandKind.Handshake:
                this._endpoints.set(command.peer.id, { peer: command.peer, client });
                this._logger?.info(`[BrokerImpl] Handshake from ${command.peer.name}-${command.peer.id}`);
                break;
            case BusCommandKind.Shutdown:
                this._removeEndpoint(command.peer.id);
                break;
            case BusCommandKind.RequestName:
                this._onRequestName(client, command);
                break;
            case BusCommandKind.NameHasOwner:
                this._onNameHasOwner(client, command);
                break;
            case BusCommandKind.MethodCall:
                this._onMethodCall(client, command);
                break;
            case BusCommandKind.MethodReturn:
            case BusCommandKind.Error:
                this._pendingCalls.delete(pendingKey(command.target, command.requestId));
                this._endpoints.get(command.target)?.client.send(command);
                break;
            case BusCommandKind.Signal:
                this._onSignal(command);
                break;
            default:
                this._logger?.warn(`[BrokerImpl] Unexpected command ${command.kind} from ${client}`);
                break;
        }
    }

    private _onRequestName(client: BrokerClient, command: RequestNameCommand): void {
        const owner = this._owners.get(command.serviceName);
        const reply: ReplyCommand = {
            kind: BusCommandKind.Reply,
            requestId: command.requestId,
            target: command.peer.id,
            result: true,
        };
        if (owner !== undefined && owner !== command.peer.id) {
            reply.result = false;
            reply.error = `Name '${command.serviceName}' is already owned by another peer`;
            client.send(reply);
            return;
        }
        if (owner === undefined) {
            this._owners.set(command.serviceName, command.peer.id);
        }
        client.send(reply);
        if (owner === undefined) {
            this._logger?.info(`[BrokerImpl] ${command.peer.name}-${command.peer.id} owns ${command.serviceName}`);
            this._broadcast({
                kind: BusCommandKind.NameOwnerChanged,
                serviceName: command.serviceName,
                owner: command.peer.id,
            });
        }
    }

    private _onNameHasOwner(client: BrokerClient, command: NameHasOwnerCommand): void {
        client.send({
            kind: BusCommandKind.Reply,
            requestId: command.requestId,
            target: command.peer.id,
            result: this._owners.has(command.serviceName),
        });
    }

    private _onMethodCall(client: BrokerClient, command: MethodCallCommand): void {
        const ownerId = this._owners.get(command.destination);
        const endpoint = ownerId !== undefined ? this._endpoints.get(ownerId) : undefined;
        if (ownerId === undefined || !endpoint) {
            const error: ErrorCommand = {
                kind: BusCommandKind.Error,
                requestId: command.requestId,
                target: command.peer.id,
                errorName: BusErrorName.ServiceUnknown,
                message: `The name '${command.destination}' is not owned by any peer`,
            };
            client.send(error);
            return;
        }
        this._pendingCalls.set(pendingKey(command.peer.id, command.requestId), {
            requestId: command.requestId,
            callerId: command.peer.id,
            calleeId: ownerId,
        });
        endpoint.client.send(command);
    }

    private _onSignal(command: SignalCommand): void {
        const senderNames: string[] = [];
        this._owners.forEach((owner, serviceName) => {
            if (owner === command.peer.id) {
                senderNames.push(serviceName);
            }
        });
        this._broadcast({ ...command, senderNames });
    }

    private _removeEndpoint(peerId: string): void {
        if (!this._endpoints.delete(peerId)) {
            return;
        }
        this._pendingCalls.forEach((pending, key) => {
            if (pending.callerId === peerId) {
                this._pendingCalls.delete(key);
            } else if (pending.calleeId === peerId) {
                this._pendingCalls.delete(key);
                this._endpoints.get(pending.callerId)?.client.send({
                    kind: BusCommandKind.Error,
                    requestId: pending.requestId,
                    target: pending.callerId,
                    errorName: BusErrorName.NoReply,
                    message: 'The remote peer left the bus before replying',
                });
            }
        });
        const released: string[] = [];
        this._owners.forEach((owner, serviceName) => {
            if (owner === peerId) {
                released.push(serviceName);
            }
        });
        released.forEach((serviceName) => {
            this._owners.delete(serviceName);
            this._broadcast({ kind: BusCommandKind.NameOwnerChanged, serviceName });
        });
        this._logger?.info(`[BrokerImpl] Peer ${peerId} removed, released [${released.join(', ')}]`);
    }

    private _broadcast(command: BusCommand): void {
        Array.from(this._endpoints.values()).forEach((endpoint) => {
            endpoint.client.send(command);
        });
    }
}
