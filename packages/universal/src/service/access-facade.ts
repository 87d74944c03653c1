import { EventEmitter } from 'events';

import { DefinitionError, NotConnectedError } from '../errors';

import type { Logger } from '../log/logger';
import type { ImportStub } from './import-stub';
import type { ServiceDescriptor } from './service-descriptor';
import type { MethodTable, NotificationListener, NotificationTable, RemoteMethods } from './signature';

/** Key of the attach operation, kept out of the facade's public surface. */
export const attachStub = Symbol('attachStub');

/**
 * What application code holds for a remote service. Starts unattached: every call rejects with
 * `NotConnectedError` until a stub is attached, which happens at most once.
 */
export class AccessFacade<M extends MethodTable, N extends NotificationTable> {
    private readonly _emitter = new EventEmitter();
    private _stub?: ImportStub;

    constructor(
        public readonly descriptor: ServiceDescriptor<M, N>,
        private readonly _logger?: Logger
    ) {
        this._emitter.setMaxListeners(0);
        for (const { name } of descriptor.methodList) {
            Object.defineProperty(this, name, {
                value: (...args: unknown[]) => this._forward(name, args),
                enumerable: true,
            });
        }
    }

    get isConnected(): boolean {
        return this._stub !== undefined;
    }

    [attachStub](stub: ImportStub): void {
        if (this._stub) {
            throw new DefinitionError(`Service '${this.descriptor.serviceName}' is already connected`);
        }
        this._stub = stub;
        for (const { name } of this.descriptor.notificationList) {
            stub.on(name, (...values: unknown[]) => {
                this._emitter.emit(name, ...values);
            });
        }
        this._logger?.info(`[AccessFacade] Service '${this.descriptor.serviceName}' is connected`);
    }

    //#region notifications
    on<K extends keyof N & string>(event: K, listener: NotificationListener<N[K]>): this {
        this._emitter.on(event, listener);
        return this;
    }

    once<K extends keyof N & string>(event: K, listener: NotificationListener<N[K]>): this {
        this._emitter.once(event, listener);
        return this;
    }

    off<K extends keyof N & string>(event: K, listener: NotificationListener<N[K]>): this {
        this._emitter.off(event, listener);
        return this;
    }

    removeAllListeners(event?: keyof N & string): this {
        this._emitter.removeAllListeners(event);
        return this;
    }

    listenerCount(event: keyof N & string): number {
        return this._emitter.listenerCount(event);
    }
    //#endregion

    private _forward(member: string, args: unknown[]): Promise<unknown> {
        const stub = this._stub;
        if (!stub) {
            return Promise.reject(new NotConnectedError(this.descriptor.serviceName, member));
        }
        return stub.invoke(member, args);
    }
}

/**
 * Access facade typed with the service's methods.
 */
export type RemoteService<M extends MethodTable, N extends NotificationTable> = AccessFacade<M, N> & RemoteMethods<M>;

export function createAccessFacade<M extends MethodTable, N extends NotificationTable>(
    descriptor: ServiceDescriptor<M, N>,
    logger?: Logger
): RemoteService<M, N> {
    // methods are defined per descriptor in the constructor
    return new AccessFacade(descriptor, logger) as RemoteService<M, N>;
}
