import { isVoidKind } from '../codec/value-kind';
import { DefinitionError } from '../errors';

import type { BusAddress } from '../bus/bus-connection';
import type { BusSelector } from '../bus/bus-registry';
import type { CodecRegistry } from '../codec/codec-registry';
import type { AnyValueKind } from '../codec/value-kind';
import type { AnyMethodSignature, AnyNotificationSignature, MethodTable, NotificationTable } from './signature';

export interface ServiceSpec<M extends MethodTable, N extends NotificationTable> {
    serviceName: string;
    objectPath: string;
    interfaceName: string;
    /** Defaults to the session bus. */
    bus?: BusSelector;
    methods: M;
    notifications: N;
}

export interface NamedMethodSignature extends AnyMethodSignature {
    readonly name: string;
}

export interface NamedNotificationSignature extends AnyNotificationSignature {
    readonly name: string;
}

/**
 * Frozen description of a service shared by its export adapter, import stubs and access facades.
 * `methodList` and `notificationList` keep declaration order.
 */
export interface ServiceDescriptor<M extends MethodTable, N extends NotificationTable> extends BusAddress {
    readonly bus: BusSelector;
    readonly methods: M;
    readonly notifications: N;
    readonly methodList: readonly NamedMethodSignature[];
    readonly notificationList: readonly NamedNotificationSignature[];
}

export type AnyServiceDescriptor = ServiceDescriptor<MethodTable, NotificationTable>;

const serviceNamePattern = /^[A-Za-z_-][A-Za-z0-9_-]*(\.[A-Za-z_-][A-Za-z0-9_-]*)+$/;
const interfaceNamePattern = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)+$/;
const objectPathPattern = /^(\/|(\/[A-Za-z0-9_]+)+)$/;
const memberNamePattern = /^[A-Za-z_][A-Za-z0-9_]*$/;
const MaxNameLength = 255;

// Members of the access facade itself
const reservedMemberNames = new Set<string>([
    'on',
    'once',
    'off',
    'removeAllListeners',
    'listenerCount',
    'isConnected',
    'descriptor',
    '_emitter',
    '_stub',
    '_logger',
    '_forward',
    ...Object.getOwnPropertyNames(Object.prototype),
    // a facade with `then` would be taken for a promise
    'then',
    'catch',
    'finally',
    // events with a meaning of their own to an EventEmitter
    'error',
    'newListener',
    'removeListener',
]);

function checkName(what: string, value: string, pattern: RegExp): void {
    if (value.length > MaxNameLength || !pattern.test(value)) {
        throw new DefinitionError(`Invalid ${what} '${value}'`);
    }
}

function checkKinds(codecs: CodecRegistry, member: string, kinds: readonly AnyValueKind[]): void {
    kinds.forEach((kind, index) => {
        if (isVoidKind(kind)) {
            throw new DefinitionError(`Parameter ${index} of '${member}' cannot be of kind '${kind.id}'`);
        }
        if (!codecs.has(kind)) {
            throw new DefinitionError(`No codec is registered for '${kind.id}' (parameter ${index} of '${member}')`);
        }
    });
}

function checkMember(name: string, seen: Set<string>): void {
    checkName('member name', name, memberNamePattern);
    if (reservedMemberNames.has(name)) {
        throw new DefinitionError(`Member name '${name}' is reserved`);
    }
    if (seen.has(name)) {
        throw new DefinitionError(`Member name '${name}' is declared twice`);
    }
    seen.add(name);
}

/**
 * Validates `spec` against the codec registry and freezes it into a descriptor.
 * Throws `DefinitionError` on the first problem found.
 */
export function createServiceDescriptor<M extends MethodTable, N extends NotificationTable>(
    spec: ServiceSpec<M, N>,
    codecs: CodecRegistry
): ServiceDescriptor<M, N> {
    checkName('service name', spec.serviceName, serviceNamePattern);
    checkName('interface name', spec.interfaceName, interfaceNamePattern);
    checkName('object path', spec.objectPath, objectPathPattern);

    const methods: MethodTable = spec.methods;
    const notifications: NotificationTable = spec.notifications;
    const seen = new Set<string>();
    const methodList = Object.entries(methods).map(([name, signature]): NamedMethodSignature => {
        checkMember(name, seen);
        checkKinds(codecs, name, signature.params);
        if (!isVoidKind(signature.returns) && !codecs.has(signature.returns)) {
            throw new DefinitionError(`No codec is registered for '${signature.returns.id}' (result of '${name}')`);
        }
        Object.freeze(signature.params);
        Object.freeze(signature);
        return Object.freeze({ name, ...signature });
    });
    const notificationList = Object.entries(notifications).map(
        ([name, signature]): NamedNotificationSignature => {
            checkMember(name, seen);
            checkKinds(codecs, name, signature.params);
            Object.freeze(signature.params);
            Object.freeze(signature);
            return Object.freeze({ name, ...signature });
        }
    );
    Object.freeze(spec.methods);
    Object.freeze(spec.notifications);

    const descriptor: ServiceDescriptor<M, N> = {
        serviceName: spec.serviceName,
        objectPath: spec.objectPath,
        interfaceName: spec.interfaceName,
        bus: spec.bus ?? 'session',
        methods: spec.methods,
        notifications: spec.notifications,
        methodList: Object.freeze(methodList),
        notificationList: Object.freeze(notificationList),
    };
    return Object.freeze(descriptor);
}
