import { DefinitionError, RegistrationError, UnknownMethodError } from '../errors';
import { marshalArgs, unmarshalArgs, wrapReturn } from '../marshal/call-marshaler';

import type { BusConnection, BusObject } from '../bus/bus-connection';
import type { CodecRegistry } from '../codec/codec-registry';
import type { Logger } from '../log/logger';
import type { NamedMethodSignature, ServiceDescriptor } from './service-descriptor';
import type { MethodTable, NotificationSource, NotificationTable, ServiceImplementation } from './signature';

type CallHandler = (...args: unknown[]) => unknown;

function isNotificationSource(value: object): value is NotificationSource {
    return typeof Reflect.get(value, 'on') === 'function';
}

/**
 * Exposes one implementation on the bus: incoming calls are decoded, run on the implementation
 * and encoded back; notifications emitted by the implementation are re-emitted as bus signals.
 */
export class ExportAdapter<M extends MethodTable, N extends NotificationTable> implements BusObject {
    private readonly _callHandlers = new Map<string, { signature: NamedMethodSignature; handler: CallHandler }>();

    private constructor(
        public readonly descriptor: ServiceDescriptor<M, N>,
        private readonly _implementation: ServiceImplementation<M, N>,
        private readonly _connection: BusConnection,
        private readonly _codecs: CodecRegistry,
        private readonly _logger?: Logger
    ) {
        for (const signature of descriptor.methodList) {
            const member: unknown = Reflect.get(_implementation, signature.name);
            if (typeof member !== 'function') {
                throw new DefinitionError(
                    `Implementation of '${descriptor.interfaceName}' has no method '${signature.name}'`
                );
            }
            this._callHandlers.set(signature.name, {
                signature,
                handler: (...args: unknown[]): unknown => member.apply(_implementation, args),
            });
        }
    }

    public get interfaceName(): string {
        return this.descriptor.interfaceName;
    }

    /**
     * Registers `implementation` at the descriptor's object path, then the service name.
     * Rejects with `RegistrationError` if either is taken; the path is released again when the name fails.
     */
    static async register<M extends MethodTable, N extends NotificationTable>(
        descriptor: ServiceDescriptor<M, N>,
        implementation: ServiceImplementation<M, N>,
        connection: BusConnection,
        codecs: CodecRegistry,
        logger?: Logger
    ): Promise<ExportAdapter<M, N>> {
        const adapter = new ExportAdapter(descriptor, implementation, connection, codecs, logger);
        if (descriptor.notificationList.length > 0 && !isNotificationSource(implementation)) {
            throw new DefinitionError(
                `Implementation of '${descriptor.interfaceName}' declares notifications but has no 'on' method`
            );
        }

        try {
            connection.registerObject(descriptor.objectPath, adapter);
        } catch (error) {
            logger?.warn(`[ExportAdapter] Cannot register object at path ${descriptor.objectPath}: ${error}`);
            throw error instanceof RegistrationError
                ? error
                : new RegistrationError(`Cannot register object at path '${descriptor.objectPath}': ${error}`);
        }
        try {
            await connection.registerName(descriptor.serviceName);
        } catch (error) {
            connection.unregisterObject(descriptor.objectPath);
            logger?.warn(`[ExportAdapter] Cannot register service ${descriptor.serviceName}: ${error}`);
            throw error instanceof RegistrationError
                ? error
                : new RegistrationError(`Cannot register service '${descriptor.serviceName}': ${error}`);
        }

        adapter._hookNotifications();
        logger?.info(`[ExportAdapter] Service '${descriptor.serviceName}' exported at ${descriptor.objectPath}`);
        return adapter;
    }

    public async invoke(member: string, args: readonly string[]): Promise<string> {
        const callHandler = this._callHandlers.get(member);
        if (!callHandler) {
            throw new UnknownMethodError(this.descriptor.interfaceName, member);
        }
        const { signature, handler } = callHandler;
        const values = unmarshalArgs(this._codecs, member, signature.params, args);
        this._logger?.info(`[ExportAdapter] Service '${this.descriptor.serviceName}' is calling '${member}'`);
        const result = await handler(...values);
        return wrapReturn(this._codecs, signature.returns, result);
    }

    private _hookNotifications(): void {
        const implementation: object = this._implementation;
        if (!isNotificationSource(implementation)) {
            return;
        }
        const { objectPath, interfaceName } = this.descriptor;
        for (const signature of this.descriptor.notificationList) {
            implementation.on(signature.name, (...values: unknown[]) => {
                const args = marshalArgs(this._codecs, signature.name, signature.params, values);
                this._connection.emit(objectPath, interfaceName, signature.name, args);
            });
        }
    }
}
