import { BusCommandKind, BusErrorName } from '../contract/bus-command';
import { CallError, RegistrationError, UnknownMethodError, hasErrorCode } from '../errors';
import { ContractLogLevel } from '../log/bus-log-config';
import { BusLogConfigImpl, formatLogArgs } from '../log/bus-log-config-impl';
import { ConnectionState } from '../utils/connection-state';
import { DeferredRequest } from '../utils/deferred-request';
import { uuidProvider } from '../utils/uuid';

import type { BusConnector, BusConnectorClient } from './bus-connector';
import type { BusAddressLike, CloseOptions } from './connect-options';
import type { BusAddress, BusConnection, BusObject, BusSignalListener, BusWatch } from '../bus/bus-connection';
import type {
    BusCommand,
    ErrorCommand,
    MethodCallCommand,
    MethodReturnCommand,
    NameHasOwnerCommand,
    ReplyCommand,
    RequestNameCommand,
    SignalCommand,
} from '../contract/bus-command';
import type { BusPeer } from '../contract/bus-peer';
import type { BusLogConfig } from '../log/bus-log-config';
import type { Logger } from '../log/logger';
import type { UuidProvider } from '../utils/uuid';

interface SignalSubscription {
    address: BusAddress;
    member: string;
    listener: BusSignalListener;
}

function busErrorNameOf(err: unknown): string {
    if (err instanceof CallError) {
        return err.busErrorName;
    }
    if (err instanceof UnknownMethodError) {
        return BusErrorName.UnknownMethod;
    }
    if (hasErrorCode(err)) {
        return err.code;
    }
    if (err instanceof Error) {
        return err.name;
    }
    return BusErrorName.Failed;
}

function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * `BusConnection` over a connector: objects and signal subscriptions are kept here,
 * names and routing belong to the broker.
 */
export class BusConnectionImpl implements BusConnection, BusConnectorClient {
    private readonly _objects = new Map<string, BusObject>();
    private readonly _pendingCalls = new Map<string, DeferredRequest<string>>();
    private readonly _pendingReplies = new Map<string, DeferredRequest<ReplyCommand>>();
    private readonly _subscriptions: SignalSubscription[] = [];
    private readonly _watches = new Map<string, Set<() => void>>();
    private readonly _connectCloseState = new ConnectionState<BusPeer>();

    constructor(
        private readonly _connector: BusConnector,
        private readonly _uuid: UuidProvider = uuidProvider,
        private readonly _logConfig: BusLogConfig = new BusLogConfigImpl(),
        private readonly _logger?: Logger
    ) {}

    public get name(): string {
        return this._connector.peer.name;
    }

    public get peer(): BusPeer {
        return this._connector.peer;
    }

    public get connected(): boolean {
        return this._connectCloseState.connected;
    }

    public connect(address?: BusAddressLike): Promise<BusPeer> {
        return this._connectCloseState.connect(() => this._connector.handshake(this, address));
    }

    public close(options?: CloseOptions): Promise<void> {
        return this._connectCloseState.close(() => this._connector.shutdown(options));
    }

    public registerObject(objectPath: string, object: BusObject): void {
        if (this._objects.has(objectPath)) {
            throw new RegistrationError(`Cannot register object at path '${objectPath}': path is already in use`);
        }
        this._objects.set(objectPath, object);
        this._logger?.info(`[BusConnection ${this.name}] Object ${object.interfaceName} registered at ${objectPath}`);
    }

    public unregisterObject(objectPath: string): void {
        this._objects.delete(objectPath);
    }

    public async registerName(serviceName: string): Promise<void> {
        if (!this.connected) {
            throw new RegistrationError(`Cannot register service '${serviceName}': connection is closed`);
        }
        const command: RequestNameCommand = {
            kind: BusCommandKind.RequestName,
            peer: this.peer,
            requestId: this._uuid(),
            serviceName,
        };
        const reply = await this._sendRequest(command);
        if (!reply.result) {
            throw new RegistrationError(`Cannot register service '${serviceName}': ${reply.error}`);
        }
        this._logger?.info(`[BusConnection ${this.name}] Service ${serviceName} registered`);
    }

    public async isRegistered(serviceName: string): Promise<boolean> {
        const command: NameHasOwnerCommand = {
            kind: BusCommandKind.NameHasOwner,
            peer: this.peer,
            requestId: this._uuid(),
            serviceName,
        };
        const reply = await this._sendRequest(command);
        return reply.result;
    }

    public watchRegistration(serviceName: string, onRegistered: () => void): BusWatch {
        const watch = () => onRegistered();
        let watches = this._watches.get(serviceName);
        if (!watches) {
            watches = new Set();
            this._watches.set(serviceName, watches);
        }
        watches.add(watch);
        return {
            cancel: () => {
                const current = this._watches.get(serviceName);
                if (current?.delete(watch) && current.size === 0) {
                    this._watches.delete(serviceName);
                }
            },
        };
    }

    public call(address: BusAddress, member: string, args: readonly string[]): Promise<string> {
        if (!this.connected) {
            return Promise.reject(
                new CallError(BusErrorName.NotConnected, `Connection '${this.name}' is not connected to a bus`)
            );
        }
        const command: MethodCallCommand = {
            kind: BusCommandKind.MethodCall,
            peer: this.peer,
            requestId: this._uuid(),
            destination: address.serviceName,
            objectPath: address.objectPath,
            interfaceName: address.interfaceName,
            member,
            args: [...args],
        };
        const deferred = new DeferredRequest<string>(command.requestId);
        this._pendingCalls.set(deferred.id, deferred);
        this._logTraffic(`call ${address.serviceName} ${address.interfaceName}.${member}`, args);
        this._connector.postCommand(command);
        return deferred.promise;
    }

    public emit(objectPath: string, interfaceName: string, member: string, args: readonly string[]): void {
        if (!this.connected) {
            this._logger?.warn(`[BusConnection ${this.name}] Signal ${interfaceName}.${member} dropped: not connected`);
            return;
        }
        const command: SignalCommand = {
            kind: BusCommandKind.Signal,
            peer: this.peer,
            objectPath,
            interfaceName,
            member,
            args: [...args],
        };
        this._logTraffic(`emit ${objectPath} ${interfaceName}.${member}`, args);
        this._connector.postCommand(command);
    }

    public subscribe(address: BusAddress, member: string, listener: BusSignalListener): BusWatch {
        const subscription: SignalSubscription = { address, member, listener };
        this._subscriptions.push(subscription);
        return {
            cancel: () => {
                const index = this._subscriptions.indexOf(subscription);
                if (index >= 0) {
                    this._subscriptions.splice(index, 1);
                }
            },
        };
    }

    // BusConnectorClient
    public onConnectorCommand(command: BusCommand): void {
        switch (command.kind) {
            case BusCommandKind.Reply: {
                const deferred = this._pendingReplies.get(command.requestId);
                this._pendingReplies.delete(command.requestId);
                deferred?.resolve(command);
                break;
            }
            case BusCommandKind.MethodReturn: {
                const deferred = this._pendingCalls.get(command.requestId);
                this._pendingCalls.delete(command.requestId);
                this._logTraffic(`return ${command.requestId}`, [command.value]);
                deferred?.resolve(command.value);
                break;
            }
            case BusCommandKind.Error: {
                const deferred = this._pendingCalls.get(command.requestId);
                this._pendingCalls.delete(command.requestId);
                this._logTraffic(`error ${command.requestId} ${command.errorName}`);
                deferred?.reject(new CallError(command.errorName, command.message));
                break;
            }
            case BusCommandKind.NameOwnerChanged:
                if (command.owner !== undefined) {
                    const watches = this._watches.get(command.serviceName);
                    if (watches) {
                        Array.from(watches).forEach((watch) => watch());
                    }
                }
                break;
            case BusCommandKind.MethodCall:
                this._onMethodCall(command).catch((error: unknown) => {
                    this._logger?.error(`[BusConnection ${this.name}] Failed to reply to ${command.member}: ${error}`);
                });
                break;
            case BusCommandKind.Signal:
                this._onSignal(command);
                break;
            default:
                break;
        }
    }

    public onConnectorShutdown(): void {
        this._connectCloseState.shutdown();
        const calls = Array.from(this._pendingCalls.values());
        const replies = Array.from(this._pendingReplies.values());
        this._pendingCalls.clear();
        this._pendingReplies.clear();
        const reason = () => new CallError(BusErrorName.Disconnected, `Connection '${this.name}' was closed`);
        calls.forEach((deferred) => deferred.reject(reason()));
        replies.forEach((deferred) => deferred.reject(reason()));
        this._logger?.info(`[BusConnection ${this.name}] Disconnected`);
    }

    private _sendRequest(command: RequestNameCommand | NameHasOwnerCommand): Promise<ReplyCommand> {
        if (!this.connected) {
            return Promise.reject(
                new CallError(BusErrorName.NotConnected, `Connection '${this.name}' is not connected to a bus`)
            );
        }
        const deferred = new DeferredRequest<ReplyCommand>(command.requestId);
        this._pendingReplies.set(deferred.id, deferred);
        this._connector.postCommand(command);
        return deferred.promise;
    }

    private async _onMethodCall(command: MethodCallCommand): Promise<void> {
        this._logTraffic(`dispatch ${command.objectPath} ${command.interfaceName}.${command.member}`, command.args);
        let reply: MethodReturnCommand | ErrorCommand;
        try {
            const value = await this._dispatch(command);
            reply = { kind: BusCommandKind.MethodReturn, requestId: command.requestId, target: command.peer.id, value };
        } catch (err) {
            reply = {
                kind: BusCommandKind.Error,
                requestId: command.requestId,
                target: command.peer.id,
                errorName: busErrorNameOf(err),
                message: messageOf(err),
            };
        }
        if (this.connected) {
            this._connector.postCommand(reply);
        }
    }

    private async _dispatch(command: MethodCallCommand): Promise<string> {
        const object = this._objects.get(command.objectPath);
        if (!object) {
            throw new CallError(BusErrorName.UnknownObject, `No object at path '${command.objectPath}'`);
        }
        if (object.interfaceName !== command.interfaceName) {
            throw new CallError(
                BusErrorName.UnknownInterface,
                `Object at path '${command.objectPath}' does not implement '${command.interfaceName}'`
            );
        }
        return object.invoke(command.member, command.args);
    }

    private _onSignal(command: SignalCommand): void {
        const senderNames = command.senderNames ?? [];
        this._subscriptions
            .filter(
                (subscription) =>
                    subscription.member === command.member &&
                    subscription.address.objectPath === command.objectPath &&
                    subscription.address.interfaceName === command.interfaceName &&
                    senderNames.includes(subscription.address.serviceName)
            )
            .forEach((subscription) => {
                this._logTraffic(`signal ${command.interfaceName}.${command.member}`, command.args);
                try {
                    subscription.listener([...command.args]);
                } catch (error) {
                    const signal = `${command.interfaceName}.${command.member}`;
                    this._logger?.error(`[BusConnection ${this.name}] Listener of ${signal} failed: ${error}`);
                }
            });
    }

    private _logTraffic(description: string, args?: readonly string[]): void {
        const level = this._logConfig.level;
        if (level === ContractLogLevel.None || !this._logger) {
            return;
        }
        const details = args && level & ContractLogLevel.Args ? ` [${formatLogArgs(this._logConfig, args)}]` : '';
        this._logger.info(`[BusConnection ${this.name}] ${description}${details}`);
    }
}
